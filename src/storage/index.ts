export { nodeFileSystem } from './FileSystem';
export type { FileSystem } from './FileSystem';
export { ResponseWriter, responseExtension, defaultFileName } from './ResponseWriter';
export type { ResponseWriterOptions } from './ResponseWriter';
