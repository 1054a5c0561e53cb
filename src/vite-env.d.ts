// Global build-mode flag for dead code elimination. Vitest defines it as
// true; the library build replaces it with a NODE_ENV check.
declare const __DEV__: boolean;
