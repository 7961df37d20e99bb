/**
 * Database module exports.
 */

export { openDatabase, openMemoryDatabase } from "./connection.js";
export { runMigrations, getDefaultMigrationsDir } from "./migrations.js";
export { insertPageView } from "./page-views.js";
export { insertButtonClick } from "./buttons.js";
