import 'reflect-metadata';

// The persistence driver is chosen when modules load; tests never reach a database
process.env.DATABASE_DRIVER = 'memory';
process.env.ARTIFACT_STORAGE_DRIVER = 'local';
