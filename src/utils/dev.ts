/***
 * Dev flag - gates invariant checks that are too costly for production.
 *
 * True unless NODE_ENV is "production". Checks guarded by it throw on a
 * corrupted invariant; production builds skip them.
 *
 ***/

export const __DEV__: boolean = process.env.NODE_ENV !== "production";
