/**
 * @keyline/node - Node.js file I/O for keyline
 *
 * Re-exports everything from @keyline/core plus file sinks and sources.
 */

// Re-export everything from core
export * from "@keyline/core";
// Convenience wrappers (no manual sink/source wiring)
export { decodeFromFile, encodeToFile } from "./convenience.js";
export type { FileSinkOptions, FileSourceOptions } from "./file-io.js";
// File sink and source
export { fileSink, fileSource } from "./file-io.js";
