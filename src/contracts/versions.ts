export const ENGINE_VERSION = '1.2.0' as const;
export const CONTRACT_VERSION = '1' as const;
export const RUBRIC_VERSION = '2024.1' as const;
