/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_API_URL?: string;
  readonly VITE_TIME_POLL_MS?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
