declare namespace NodeJS {
  interface ProcessEnv {
    // Application Settings
    APP_NAME?: string;
    NODE_ENV?: 'development' | 'production' | 'test';

    // Engine Settings
    DEVICE_NAME?: string;
    DOWNLOAD_DIR?: string;
    DEVICE_VISIBLE?: string;
    STATIC_PORT?: string;

    // Transfers
    CONSENT_TIMEOUT_MS?: string;

    // Logging (Optional)
    LOG_LEVEL?: string;
  }
}
