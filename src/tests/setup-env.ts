process.env.NODE_ENV ||= "test";

// Auth-Konfiguration wird beim Import von env.ts gelesen.
process.env.JWT_SECRET ||= "test-secret";
process.env.APP_ENV ||= "test";

// Guenstige argon2-Parameter, damit die Suite schnell bleibt.
process.env.HASH_MEMORY_COST_KIB ||= "1024";
process.env.HASH_TIME_COST ||= "2";
process.env.HASH_PARALLELISM ||= "1";
process.env.HASH_POOL_SIZE ||= "2";

process.env.LOG_LEVEL ||= "silent";
