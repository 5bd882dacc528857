/**
 * FsPath: an exception-free wrapper around synchronous path operations.
 *
 * Every query returns AStatusOrElse<T> and every mutation returns a
 * Status. Errors raised by node:fs are translated by the status adapter,
 * so a missing file surfaces as FILE_NOT_FOUND with the errno details in
 * the payload.
 *
 * Pure path manipulation (name, parent, suffix, stem, join) cannot fail
 * and returns plain values.
 */

import * as node_fs from "node:fs";
import * as node_path from "node:path";
import { useStatusValue, useStatusVoid } from "../adapter/use-status.js";
import { alreadyExistsError, okStatus, type Status } from "../types/status.js";
import type { AStatusOrElse } from "../types/status-or-else.js";

export interface MkdirOptions {
  /** Create missing parent directories. */
  readonly parents?: boolean | undefined;
  /** Succeed when the directory already exists. */
  readonly existOk?: boolean | undefined;
}

export interface RmdirOptions {
  /** Remove the directory and everything below it. */
  readonly recursive?: boolean | undefined;
}

export interface TouchOptions {
  /** Succeed (and refresh the timestamps) when the file exists. Default true. */
  readonly existOk?: boolean | undefined;
}

export interface UnlinkOptions {
  /** Succeed when the file does not exist. */
  readonly missingOk?: boolean | undefined;
}

function attempt<T>(operation: () => T): AStatusOrElse<T> {
  return useStatusValue(operation)();
}

function attemptVoid(operation: () => Status | void): Status {
  return useStatusVoid(operation)();
}

export class FsPath {
  readonly path: string;

  constructor(...segments: string[]) {
    this.path = node_path.join(...segments);
  }

  toString(): string {
    return this.path;
  }

  // -------------------------------------------------------------------------
  // Path manipulation
  // -------------------------------------------------------------------------

  /** Final path component, e.g. "report.json". */
  name(): string {
    return node_path.basename(this.path);
  }

  parent(): FsPath {
    return new FsPath(node_path.dirname(this.path));
  }

  /** Extension including the dot, e.g. ".json"; empty when there is none. */
  suffix(): string {
    return node_path.extname(this.path);
  }

  /** Final component without its extension, e.g. "report". */
  stem(): string {
    return node_path.basename(this.path, this.suffix());
  }

  join(...segments: string[]): FsPath {
    return new FsPath(this.path, ...segments);
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  exists(): AStatusOrElse<boolean> {
    return attempt(() => this.stat() !== undefined);
  }

  isFile(): AStatusOrElse<boolean> {
    return attempt(() => this.stat()?.isFile() ?? false);
  }

  isDir(): AStatusOrElse<boolean> {
    return attempt(() => this.stat()?.isDirectory() ?? false);
  }

  readText(encoding: BufferEncoding = "utf8"): AStatusOrElse<string> {
    return attempt(() => node_fs.readFileSync(this.path, { encoding }));
  }

  readBytes(): AStatusOrElse<Uint8Array> {
    return attempt(() => node_fs.readFileSync(this.path));
  }

  /**
   * Entries of this directory, sorted by name.
   */
  iterdir(): AStatusOrElse<FsPath[]> {
    return attempt(() =>
      node_fs
        .readdirSync(this.path)
        .sort()
        .map((entry) => this.join(entry)),
    );
  }

  // -------------------------------------------------------------------------
  // Mutations
  // -------------------------------------------------------------------------

  mkdir(options: MkdirOptions = {}): Status {
    return attemptVoid(() => {
      const existing = this.stat();
      if (existing !== undefined) {
        return options.existOk === true && existing.isDirectory()
          ? okStatus()
          : alreadyExistsError(`${this.path} already exists`);
      }
      node_fs.mkdirSync(this.path, { recursive: options.parents === true });
    });
  }

  rmdir(options: RmdirOptions = {}): Status {
    return attemptVoid(() => {
      if (options.recursive === true) {
        node_fs.rmSync(this.path, { recursive: true });
      } else {
        node_fs.rmdirSync(this.path);
      }
    });
  }

  touch(options: TouchOptions = {}): Status {
    return attemptVoid(() => {
      if (this.stat() === undefined) {
        node_fs.writeFileSync(this.path, "");
        return;
      }
      if (options.existOk === false) {
        return alreadyExistsError(`${this.path} already exists`);
      }
      const now = new Date();
      node_fs.utimesSync(this.path, now, now);
    });
  }

  unlink(options: UnlinkOptions = {}): Status {
    return attemptVoid(() => {
      if (options.missingOk === true && this.stat() === undefined) {
        return;
      }
      node_fs.unlinkSync(this.path);
    });
  }

  writeText(data: string, encoding: BufferEncoding = "utf8"): Status {
    return attemptVoid(() => {
      node_fs.writeFileSync(this.path, data, { encoding });
    });
  }

  writeBytes(data: Uint8Array): Status {
    return attemptVoid(() => {
      node_fs.writeFileSync(this.path, data);
    });
  }

  /** Stat without throwing on a missing entry; other errors still throw. */
  private stat(): node_fs.Stats | undefined {
    return node_fs.statSync(this.path, { throwIfNoEntry: false });
  }
}
