declare global {
    namespace NodeJS {
        interface ProcessEnv {
            PORT?: string,
            LOG_LEVEL?: string,
            CACHE_FILE?: string,
            CACHE_MAX_AGE_HOURS?: string,
            CACHE_CAPACITY?: string,
            MAX_RETRIES?: string,
            MAX_SOURCES?: string,
            MAX_CANDIDATES?: string,
            MAX_ATTEMPTS_PER_PROXY?: string,
            SOURCE_TIMEOUT_MS?: string,
            FETCH_DEADLINE_MS?: string,
            REACHABILITY_TIMEOUT_MS?: string,
            PROBE_TIMEOUT_MS?: string,
            VALIDATION_CONCURRENCY?: string,
            LENIENT_VALIDATION?: string,
        }
    }
}

export {};
