declare namespace NodeJS {
  interface ProcessEnv {
    NODE_ENV?: string;
    PORT?: string;
    HOST?: string;
    DATABASE_PATH?: string;          // SQLite file, relative to the working directory
    DB_BUSY_TIMEOUT_MS?: string;
    DB_RESET_ON_START?: string;      // "true" drops and recreates the table on startup
    SESSION_SECRET?: string;
    LOG_LEVEL?: string;
    LOG_FILE?: string;               // empty disables the rotating file
    LOG_ROTATE_SIZE?: string;        // e.g. 10M
    LOG_ROTATE_INTERVAL?: string;    // e.g. 1d
    LOG_MAX_FILES?: string;
    LOG_FORMAT?: string;             // morgan format
  }
}
