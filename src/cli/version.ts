/**
 * Current tapforge version; matches package.json.
 */
export const CLI_VERSION = "0.1.0";
