export * from "./auth.js";
export * from "./config.js";
export * from "./db.js";
export * from "./drizzleStore.js";
export * from "./errors.js";
export * from "./install.js";
export * from "./logger.js";
export * from "./memoryStore.js";
export { runMigrations, MIGRATIONS_DIR, type SqlClient } from "./migrate.js";
export * from "./models.js";
export * from "./policy.js";
export * from "./refresh.js";
export * from "./store.js";
export * from "./types.js";
export * from "./views.js";
export * from "./webhooks.js";
