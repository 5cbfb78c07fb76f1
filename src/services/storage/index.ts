export * from './interface';
export { createPostgresStore, PgStore } from './postgres';
