export { SqliteStore, type SqliteStoreOptions } from "./sqlite-store.js";
export { PersistenceFailure } from "./errors.js";
export { checksumFile } from "./checksum.js";
export type * from "./types.js";
