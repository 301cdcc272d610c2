/**
 * zip.js configured for in-process use under Node: no web workers, and the
 * bundled deflate codec rather than the runtime's CompressionStream
 */

import { configure } from '@zip.js/zip.js';

configure({ useWebWorkers: false, useCompressionStream: false });

export { TextReader, TextWriter, Uint8ArrayReader, Uint8ArrayWriter, ZipReader, ZipWriter } from '@zip.js/zip.js';
