/**
 * Centralized regex handling for user-provided patterns.
 *
 * Usage:
 *   import { createUserRegex } from '../regex/index.js';
 *
 *   const regex = createUserRegex(userPattern, 'i');
 *   if (regex.test(line)) { ... }
 */

export { createUserRegex, type RegexLike, UserRegex } from "./user-regex.js";
