/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_DIALTONE_VERSION?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
