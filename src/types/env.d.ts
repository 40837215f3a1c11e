declare namespace NodeJS {
  interface ProcessEnv {
    NODE_ENV?: string;
    PORT?: string;
    LOG_LEVEL?: string;
    DISABLE_LOGGING?: string;
    TX_TIMEOUT_MS?: string;
    BULK_TIMEOUT_MS?: string;
    ESTIMATED_DELIVERY_DAYS?: string;
    SEED_FILE?: string;
  }
}
