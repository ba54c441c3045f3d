import type { ServerAddress } from "../shared/net.js";
import type { WireDocument } from "../value/wire.js";

/** Result set of a query; `next()` may only be called while `more()` is true. */
export interface Cursor {
  more(): boolean;
  next(): WireDocument;
}

export interface CommandResult {
  /** The driver's verdict; a reply whose own `ok` is 0 or false fails regardless. */
  ok: boolean;
  reply: WireDocument;
}

/**
 * Synchronous, blocking database driver. Every method runs on the connection's worker
 * context only. Failures are thrown (preferably as DriverError); a `null` cursor from
 * `query` means the connection was lost.
 */
export interface Driver {
  connect(address: ServerAddress): void;
  isFailed(): boolean;
  query(collection: string, filter: WireDocument): Cursor | null;
  insert(collection: string, documents: WireDocument | readonly WireDocument[]): void;
  update(
    collection: string,
    filter: WireDocument,
    document: WireDocument,
    upsert: boolean,
    multi: boolean,
  ): void;
  remove(collection: string, filter: WireDocument, limitToOne: boolean): void;
  /** Status of the last write; empty when it succeeded. */
  getLastError(): string;
  runCommand(database: string, command: WireDocument): CommandResult;
}
