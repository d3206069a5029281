process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';

// better-sqlite3 loads its native addon once per process and binds it to the SqliteError class of the
// first test file's sandbox; clear that flag so each test file registers its own SqliteError and
// `instanceof Error` holds in every suite, as it does outside Jest.
const sqliteAddon: { isInitialized?: boolean } = require('better-sqlite3/build/Release/better_sqlite3.node');
sqliteAddon.isInitialized = false;
