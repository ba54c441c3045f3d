import { SerialContext, type ExecutionContext } from "./bridge/context.js";
import {
  Deferred,
  type DeferredCommand,
  type DeferredConnect,
  type DeferredInsert,
  type DeferredQuery,
  type DeferredRemove,
  type DeferredUpdate,
} from "./bridge/deferred.js";
import {
  callbackDelivery,
  deferredDelivery,
  unacknowledgedDelivery,
  type Delivery,
  type OperationCallback,
} from "./bridge/delivery.js";
import { DispatchBridge, success, type OperationBody } from "./bridge/dispatch.js";
import type { BridgeConfig } from "./config.js";
import type { Driver } from "./driver/types.js";
import {
  COMMAND_FAILED_MESSAGE,
  CONNECTION_LOST_MESSAGE,
  DEFAULT_HOST,
} from "./shared/constants.js";
import {
  CommandFailedError,
  ConnectFailureError,
  ConnectionLostError,
  LastErrorReported,
  NotConnectedError,
  errorMessage,
} from "./shared/errors.js";
import { genId } from "./shared/ids.js";
import { getLogger, type Logger } from "./shared/logging.js";
import { formatAddress, parseAddress, type ServerAddress } from "./shared/net.js";
import { decode, encode } from "./value/convert.js";
import {
  Value,
  fromPlain,
  isValue,
  type ConversionOptions,
  type DocumentInput,
} from "./value/value.js";
import type { WireDocument } from "./value/wire.js";

export interface ConnectionOptions {
  driver: Driver;
  /**
   * Runs every driver call. Defaults to a fresh SerialContext, which shares the event-loop
   * thread: a slow driver call then stalls every context in the process. Blocking drivers
   * should supply a context that runs tasks off the main thread.
   */
  worker?: ExecutionContext;
  /** Runs every reaction and callback. Defaults to a fresh SerialContext. */
  notifier?: ExecutionContext;
  /** Address used by `connect()` without a host. Defaults to "localhost". */
  host?: string;
  /** Reject unsupported values instead of dropping them. */
  strictConversion?: boolean;
  logger?: Logger;
}

/**
 * "copy" snapshots plain input when the call is made, so the caller may keep mutating its
 * object. "move" hands the object over; it is converted later, on the worker.
 */
export type Ownership = "copy" | "move";

export interface OperationOptions {
  ownership?: Ownership;
}

export interface UpdateOptions extends OperationOptions {
  upsert?: boolean;
  multi?: boolean;
}

export interface RemoveOptions extends OperationOptions {
  limitToOne?: boolean;
}

export type ConnectCallback = (connected: boolean, error: string) => void;
export type QueryCallback = OperationCallback<[Value]>;
export type CommandCallback = OperationCallback<[Value]>;
export type WriteCallback = OperationCallback<[]>;

type Captured = () => Value;

function isCallback<Args extends unknown[]>(value: unknown): value is OperationCallback<Args> {
  return typeof value === "function";
}

function splitArgs<Args extends unknown[], O extends object>(
  callbackOrOptions: OperationCallback<Args> | O | undefined,
  options: O | undefined,
): [OperationCallback<Args> | undefined, O | undefined] {
  if (isCallback<Args>(callbackOrOptions)) return [callbackOrOptions, options];
  return [undefined, callbackOrOptions];
}

function isDocumentList(
  documents: DocumentInput | readonly DocumentInput[],
): documents is readonly DocumentInput[] {
  return Array.isArray(documents);
}

/** A reply's own `ok` field; a reply without one defers to the driver's flag. */
function replyOk(reply: WireDocument): boolean {
  const field = reply.get("ok");
  if (!field) return true;
  switch (field.type) {
    case "bool":
      return field.value;
    case "int32":
    case "double":
      return field.value !== 0;
    case "int64":
      return field.value !== 0n;
    default:
      return true;
  }
}

function commandError(reply: WireDocument): string {
  for (const key of ["errmsg", "error"]) {
    const field = reply.get(key);
    if (field?.type === "string" && field.value) return field.value;
  }
  return COMMAND_FAILED_MESSAGE;
}

/**
 * Asynchronous connection over a synchronous driver.
 *
 * Driver calls run one at a time, in submission order, on the worker context; outcomes are
 * delivered on the notifier context. The driver is only ever touched from worker tasks.
 */
export class Connection {
  readonly id = genId("conn");
  private readonly driver: Driver;
  private readonly bridge: DispatchBridge;
  private readonly logger: Logger;
  private readonly conversion: ConversionOptions;
  private readonly defaultHost: string;
  // worker-only state
  private address: ServerAddress | null = null;

  constructor(options: ConnectionOptions) {
    this.driver = options.driver;
    this.logger = (options.logger ?? getLogger()).child({
      component: "connection",
      connection: this.id,
    });
    this.conversion = { strict: options.strictConversion ?? false };
    this.defaultHost = options.host ?? DEFAULT_HOST;
    this.bridge = new DispatchBridge(
      options.worker ?? new SerialContext(`${this.id}:worker`, this.logger),
      options.notifier ?? new SerialContext(`${this.id}:notifier`, this.logger),
      this.logger,
    );
  }

  static fromConfig(driver: Driver, config: BridgeConfig): Connection {
    return new Connection({
      driver,
      host: config.host,
      strictConversion: config.strictConversion,
    });
  }

  /**
   * Connect to `host[:port]` (port 27017 by default), or to the configured host when none is
   * given. A malformed address or a driver failure is reported as a failed connect.
   */
  connect(host?: string): DeferredConnect;
  connect(host: string | undefined, callback: ConnectCallback): void;
  connect(host?: string, callback?: ConnectCallback): DeferredConnect | void {
    const target = host ?? this.defaultHost;
    const body: OperationBody<[]> = () => {
      const address = parseAddress(target);
      try {
        this.driver.connect(address);
      } catch (err) {
        this.address = null;
        this.logger.warn(
          { address: formatAddress(address), error: errorMessage(err) },
          "connect failed",
        );
        throw new ConnectFailureError(errorMessage(err));
      }
      this.address = address;
      this.logger.info({ address: formatAddress(address) }, "connected");
      return success();
    };
    if (!callback) return this.withDeferred("connect", body);
    this.bridge.dispatch("connect", body, {
      observed: () => true,
      deliver: (outcome) => {
        if (outcome.status === "failure") callback(false, outcome.error.message);
        else callback(true, "");
      },
    });
  }

  /** Report whether a connect succeeded and the driver still considers the link healthy. */
  connected(callback: (connected: boolean) => void): void {
    const delivery: Delivery<[boolean]> = {
      observed: () => true,
      deliver: (outcome) => callback(outcome.status === "success" && outcome.args[0]),
    };
    this.bridge.dispatch(
      "connected",
      () => success(this.address !== null && !this.driver.isFailed()),
      delivery,
    );
  }

  /** Run a query; succeeds with a Sequence of the matching documents. */
  query(collection: string, filter: DocumentInput, options?: OperationOptions): DeferredQuery;
  query(collection: string, filter: DocumentInput, callback: QueryCallback, options?: OperationOptions): void;
  query(
    collection: string,
    filter: DocumentInput,
    callbackOrOptions?: QueryCallback | OperationOptions,
    maybeOptions?: OperationOptions,
  ): DeferredQuery | void {
    const [callback, options] = splitArgs<[Value], OperationOptions>(callbackOrOptions, maybeOptions);
    const captured = this.capture(filter, options);
    const body: OperationBody<[Value]> = (observed) => {
      this.requireAddress();
      const cursor = this.driver.query(collection, this.encode(captured));
      if (!cursor) throw new ConnectionLostError(CONNECTION_LOST_MESSAGE);
      if (!observed) return { status: "complete" };
      const documents: Value[] = [];
      while (cursor.more()) documents.push(decode(cursor.next(), this.conversion));
      return success(Value.sequence(documents));
    };
    return this.deliver("query", body, callback);
  }

  /** Insert one document, or several when given an array. */
  insert(collection: string, documents: DocumentInput | readonly DocumentInput[], options?: OperationOptions): DeferredInsert;
  insert(
    collection: string,
    documents: DocumentInput | readonly DocumentInput[],
    callback: WriteCallback,
    options?: OperationOptions,
  ): void;
  insert(
    collection: string,
    documents: DocumentInput | readonly DocumentInput[],
    callbackOrOptions?: WriteCallback | OperationOptions,
    maybeOptions?: OperationOptions,
  ): DeferredInsert | void {
    const [callback, options] = splitArgs<[], OperationOptions>(callbackOrOptions, maybeOptions);
    return this.deliver("insert", this.insertBody(collection, documents, options), callback);
  }

  /** Fire-and-forget insert: no status round trip, failures are logged and dropped. */
  insertUnacknowledged(
    collection: string,
    documents: DocumentInput | readonly DocumentInput[],
    options?: OperationOptions,
  ): void {
    this.bridge.dispatch(
      "insert",
      this.insertBody(collection, documents, options),
      unacknowledgedDelivery(this.logger, "insert"),
    );
  }

  update(collection: string, filter: DocumentInput, document: DocumentInput, options?: UpdateOptions): DeferredUpdate;
  update(
    collection: string,
    filter: DocumentInput,
    document: DocumentInput,
    callback: WriteCallback,
    options?: UpdateOptions,
  ): void;
  update(
    collection: string,
    filter: DocumentInput,
    document: DocumentInput,
    callbackOrOptions?: WriteCallback | UpdateOptions,
    maybeOptions?: UpdateOptions,
  ): DeferredUpdate | void {
    const [callback, options] = splitArgs<[], UpdateOptions>(callbackOrOptions, maybeOptions);
    return this.deliver("update", this.updateBody(collection, filter, document, options), callback);
  }

  updateUnacknowledged(
    collection: string,
    filter: DocumentInput,
    document: DocumentInput,
    options?: UpdateOptions,
  ): void {
    this.bridge.dispatch(
      "update",
      this.updateBody(collection, filter, document, options),
      unacknowledgedDelivery(this.logger, "update"),
    );
  }

  remove(collection: string, filter: DocumentInput, options?: RemoveOptions): DeferredRemove;
  remove(collection: string, filter: DocumentInput, callback: WriteCallback, options?: RemoveOptions): void;
  remove(
    collection: string,
    filter: DocumentInput,
    callbackOrOptions?: WriteCallback | RemoveOptions,
    maybeOptions?: RemoveOptions,
  ): DeferredRemove | void {
    const [callback, options] = splitArgs<[], RemoveOptions>(callbackOrOptions, maybeOptions);
    return this.deliver("remove", this.removeBody(collection, filter, options), callback);
  }

  removeUnacknowledged(collection: string, filter: DocumentInput, options?: RemoveOptions): void {
    this.bridge.dispatch(
      "remove",
      this.removeBody(collection, filter, options),
      unacknowledgedDelivery(this.logger, "remove"),
    );
  }

  /**
   * Run a database command. It fails when the driver or the reply's own `ok` field says so,
   * with the reply's `errmsg` (or `error`) as the message.
   */
  runCommand(database: string, command: DocumentInput, options?: OperationOptions): DeferredCommand;
  runCommand(database: string, command: DocumentInput, callback: CommandCallback, options?: OperationOptions): void;
  runCommand(
    database: string,
    command: DocumentInput,
    callbackOrOptions?: CommandCallback | OperationOptions,
    maybeOptions?: OperationOptions,
  ): DeferredCommand | void {
    const [callback, options] = splitArgs<[Value], OperationOptions>(callbackOrOptions, maybeOptions);
    const captured = this.capture(command, options);
    const body: OperationBody<[Value]> = (observed) => {
      this.requireAddress();
      const { ok, reply } = this.driver.runCommand(database, this.encode(captured));
      if (!observed) return { status: "complete" };
      if (!ok || !replyOk(reply)) throw new CommandFailedError(commandError(reply));
      return success(decode(reply, this.conversion));
    };
    return this.deliver("runCommand", body, callback);
  }

  private insertBody(
    collection: string,
    documents: DocumentInput | readonly DocumentInput[],
    options: OperationOptions | undefined,
  ): OperationBody<[]> {
    if (isDocumentList(documents)) {
      const captured = documents.map((document) => this.capture(document, options));
      return this.writeBody(() => {
        this.driver.insert(collection, captured.map((c) => this.encode(c)));
      });
    }
    const captured = this.capture(documents, options);
    return this.writeBody(() => this.driver.insert(collection, this.encode(captured)));
  }

  private updateBody(
    collection: string,
    filter: DocumentInput,
    document: DocumentInput,
    options: UpdateOptions | undefined,
  ): OperationBody<[]> {
    const capturedFilter = this.capture(filter, options);
    const capturedDocument = this.capture(document, options);
    const upsert = options?.upsert ?? false;
    const multi = options?.multi ?? false;
    return this.writeBody(() =>
      this.driver.update(
        collection,
        this.encode(capturedFilter),
        this.encode(capturedDocument),
        upsert,
        multi,
      ),
    );
  }

  private removeBody(
    collection: string,
    filter: DocumentInput,
    options: RemoveOptions | undefined,
  ): OperationBody<[]> {
    const captured = this.capture(filter, options);
    const limitToOne = options?.limitToOne ?? false;
    return this.writeBody(() => this.driver.remove(collection, this.encode(captured), limitToOne));
  }

  /** Writes only ask the driver for their status when someone observes the outcome. */
  private writeBody(write: () => void): OperationBody<[]> {
    return (observed) => {
      this.requireAddress();
      write();
      if (!observed) return { status: "complete" };
      const lastError = this.driver.getLastError();
      if (lastError) throw new LastErrorReported(lastError);
      return success();
    };
  }

  private deliver<Args extends unknown[]>(
    operation: string,
    body: OperationBody<Args>,
    callback: OperationCallback<Args> | undefined,
  ): Deferred<Args> | undefined {
    if (!callback) return this.withDeferred(operation, body);
    this.bridge.dispatch(operation, body, callbackDelivery(callback));
    return undefined;
  }

  private withDeferred<Args extends unknown[]>(operation: string, body: OperationBody<Args>): Deferred<Args> {
    const [deferred, resolver] = Deferred.create<Args>();
    this.bridge.dispatch(operation, body, deferredDelivery(deferred, resolver));
    return deferred;
  }

  /** Conversion errors from a copy are replayed on the worker, so the call itself never throws. */
  private capture(input: DocumentInput, options: OperationOptions | undefined): Captured {
    if (isValue(input)) return () => input;
    if (options?.ownership === "move") return () => fromPlain(input, this.conversion);
    try {
      const snapshot = fromPlain(input, this.conversion);
      return () => snapshot;
    } catch (err) {
      return () => {
        throw err;
      };
    }
  }

  private encode(captured: Captured): WireDocument {
    return encode(captured(), this.conversion);
  }

  private requireAddress(): void {
    if (!this.address) throw new NotConnectedError();
  }
}
