/**
 * Universal Data Model exports
 */

export * from "./node.js";
export { navigate, type NavigateOptions, type PathSegment } from "./navigator.js";
