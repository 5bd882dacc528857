/**
 * statuskit public API.
 *
 * Status values, the AStatusOrElse<T> contract and StatusOr<T> live in
 * ./types; the throw-to-status adapter in ./adapter; fatal checks and the
 * logging sink in ./log.
 */

export * from "./types/index.js";
export * from "./adapter/index.js";
export * from "./log/index.js";
export { loadConfig, type ConfigEnv } from "./config/load-config.js";
export {
  FsPath,
  type MkdirOptions,
  type RmdirOptions,
  type TouchOptions,
  type UnlinkOptions,
} from "./filesystem/fs-path.js";
