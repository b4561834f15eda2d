declare namespace NodeJS {
  interface ProcessEnv {
    RECIPIENTS?: string;
    SMTP_HOST?: string;
    SMTP_PORT?: string;
    SMTP_USER?: string;
    SMTP_PASSWORD?: string;
    SMTP_FROM?: string;
    REQUEST_DELAY_SECONDS?: string;
    MAX_PAGES?: string;
    REQUEST_TIMEOUT_MS?: string;
  }
}
