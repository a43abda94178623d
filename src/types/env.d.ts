declare namespace NodeJS {
  interface ProcessEnv {
    LOG_LEVEL?: string;
    HEAP_CHECK_INVARIANT?: string;
    HEAP_GROWTH_FACTOR?: string;
  }
}
