export {}

declare global {
  namespace NodeJS {
    interface ProcessEnv {
      NODE_ENV?: 'development' | 'production' | 'test'
      LOG_LEVEL?: 'info' | 'error' | 'warn' | 'debug' | 'trace' | 'silent'
      SERVICE_NAME?: string
      SERVICE_VERSION?: string
      PORT?: string
      /** MongoDB connection string, e.g. mongodb://localhost:27017 */
      DATABASE_URL?: string
      DATABASE_NAME?: string
      /**
       * Upper bound for server selection and socket operations against the store.
       * Falls back to 5000ms when not set.
       */
      DATABASE_TIMEOUT_MS?: string
      UPLOAD_DIR?: string
      OTEL_EXPORTER_OTLP_ENDPOINT?: string
    }
  }
}
