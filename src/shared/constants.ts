export const VERSION = "0.1.0";

/** Port assumed when an address carries none. */
export const DEFAULT_PORT = 27017;
export const DEFAULT_HOST = "localhost";

export const CONFIG_FILENAME = "docbridge.json";

export const CONNECTION_LOST_MESSAGE = "Connection to the database server was lost";
export const COMMAND_FAILED_MESSAGE = "Command failed";
