/**
 * SQLite Database Module
 *
 * Embedded relational storage for words, content cards, memberships,
 * profiles and the interest taxonomy.
 */

export { initializeSchema, getSchemaStats, dropAllTables, SCHEMA_DDL, TABLES, type TableName } from './sqlite-schema.js';
export { SqliteClient, openDatabase, isUniqueViolation, IN_MEMORY_DATABASE, type SqliteClientOptions } from './sqlite-client.js';
