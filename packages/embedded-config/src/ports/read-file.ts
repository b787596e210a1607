/**
 * Reads a whole file synchronously.
 *
 * Implementations throw the underlying I/O error (with its `code`) on failure;
 * the loader maps it to a load error.
 */
export type ReadFile = (path: string) => Uint8Array
