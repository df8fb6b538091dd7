/**
 * File classification for content search
 *
 * Uses the file-type npm package for magic byte detection.
 */

import * as nodePath from "node:path";
import { fileTypeFromBuffer } from "file-type";

export type FileClassification =
  | { kind: "text" }
  | { kind: "pdf" }
  | { kind: "unsupported"; reason: string };

const PDF_EXTENSIONS = new Set([".pdf"]);

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46, 0x2d]; // %PDF-

/**
 * Magic-byte detections that are still searchable as text.
 */
function isTextMime(mime: string): boolean {
  return (
    mime.startsWith("text/") ||
    mime === "application/xml" ||
    mime.endsWith("+xml")
  );
}

function startsWithPdfMagic(head: Uint8Array): boolean {
  return PDF_MAGIC.every((byte, i) => head[i] === byte);
}

export function hasPdfExtension(filePath: string): boolean {
  return PDF_EXTENSIONS.has(nodePath.extname(filePath).toLowerCase());
}

/**
 * Classify a file from its name and its first bytes.
 *
 * - `.pdf` extension or `%PDF-` magic → pdf
 * - a binary format known to file-type → unsupported
 * - a NUL byte in the sniffed bytes → unsupported
 * - anything else → text
 */
export async function classifyFile(
  filePath: string,
  head: Uint8Array,
): Promise<FileClassification> {
  if (hasPdfExtension(filePath) || startsWithPdfMagic(head)) {
    return { kind: "pdf" };
  }

  if (head.length === 0) {
    return { kind: "text" };
  }

  const detected = await fileTypeFromBuffer(head);
  if (detected && !isTextMime(detected.mime)) {
    return { kind: "unsupported", reason: detected.mime };
  }

  if (head.includes(0)) {
    return { kind: "unsupported", reason: "binary data" };
  }

  return { kind: "text" };
}
