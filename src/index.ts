export { FILES_DIR, loadSettings, PROXY_CACHE_FILE_PATH, type Settings } from '~/config';
export { assertCountryCodes, getCountries, isCountryCode, normalizeCountry } from '~/countries';
export { Diagnostics, type DiagnosticsReport } from '~/diagnostics';
export { Echo } from '~/echo/Echo';
export { createDefaultEchoes } from '~/echo';
export {
    ConfigurationError,
    ExhaustionError,
    ProxyFinderError,
    SourceUnavailableError,
} from '~/errors';
export { Logger, type LogLevel } from '~/logger';
export { ProxyValidator, type ValidatorOptions } from '~/proxy_checker';
export type { CandidateValidator, InvalidReason, ValidationOutcome } from '~/proxy_checker/types';
export { type CandidateSource, ConcurrentFetcher, type FetchOptions } from '~/proxy_fetcher';
export { CountryHeuristic } from '~/proxy_filter/country-heuristic';
export { ProxyFilter, type FilterOptions } from '~/proxy_filter';
export { createProxyFinder, ProxyFinder } from '~/proxy_finder';
export { HttpSourceAdapter, type SourceAdapter } from '~/proxy_parser/adapter';
export { DEFAULT_SOURCES } from '~/proxy_parser/sources';
export { ProxyCache } from '~/proxy_storage';
export {
    type GetManyOptions,
    type GetOneOptions,
    RotationManager,
    type RotationOptions,
    type RotationOutcome,
    RotationSession,
    type RotationState,
} from '~/rotation';
export type * from '~/types';
