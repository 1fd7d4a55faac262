export const ENGINE_VERSION = '0.3.0' as const;
export const CONTRACT_VERSION = 'lcoe-report-v1' as const;
