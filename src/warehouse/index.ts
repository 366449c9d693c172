export {
  QueryExecutionError,
  toQueryExecutionError,
  coerceScalar,
  type QueryExecutor,
  type QueryExecutionErrorCode,
} from "./query-executor.ts";

export {
  PostgresQueryExecutor,
  createPostgresSession,
  createSessionFromClient,
  listenForConnectionErrors,
  type ConnectionErrorSource,
  type PostgresClient,
  type WarehouseSession,
  type WarehouseConnectionConfig,
} from "./postgres-executor.ts";

export {
  InMemoryQueryExecutor,
  type ExecutorCall,
} from "./in-memory-executor.ts";
