declare namespace NodeJS {
  interface ProcessEnv {
    PORT?: string;
    DATA_DIR?: string;
    LOG_LEVEL?: string;
    SERVICE_NAME?: string;
    WORKER_POOL_SIZE?: string;
    STEP_DELAY_MS?: string;
    RESULT_DELAY_MS?: string;
    RESULT_TIMEOUT_MS?: string;
    SHUTDOWN_GRACE_MS?: string;
  }
}
