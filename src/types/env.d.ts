declare namespace NodeJS {
  interface ProcessEnv {
    NODE_ENV?: string
    DEV_LOG?: string
    LOG_LEVEL?: string
    DENSITY_DECIMALS?: string
  }
}
