export const APP_VERSION = import.meta.env.VITE_DIALTONE_VERSION ?? "2.0.0";

export const SYSTEM_NAME = "DIALTONE";
