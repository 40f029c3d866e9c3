// package.json is read at runtime rather than baked in, so bumping the version
// needs no change to the source tree.
import pkg from "../package.json" with { type: "json" };

// Read the version directly from package.json.
export const CLI_VERSION: string = pkg.version;
