/**
 * Path filters module
 */

export { createGlobMatcher, createPathFilter } from "./glob.js";
