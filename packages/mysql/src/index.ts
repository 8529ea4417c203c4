export * from "./MySqlSessionBackend";
export { MySqlConnectionManager } from "./internal/mysqlConnection";
export { classifyMySqlError, toMySqlError, type MySqlOperation } from "./internal/mysqlErrors";
