export * from "./types";
export * from "./errors";
export * from "./config";

export * from "./http/HttpContext";

export * from "./backend/StorageBackend";
export * from "./backend/TransactionDelegate";
export * from "./backend/MemorySessionBackend";

export * from "./engine/SessionEngine";
export * from "./id/SessionIdGenerator";

export * from "./session/SessionSerializer";
export * from "./session/Session";

export * from "./utils/time";

export * from "./SessionManager";
