/// <reference types="vite/client" />

// Build-mode flag for dead code elimination: true under vite dev and
// vitest, replaced by a NODE_ENV check in library builds
declare const __DEV__: boolean;
