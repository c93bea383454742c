export const ENGINE_VERSION = '1.0.0' as const;
export const CONTRACT_VERSION = 'venting-v1' as const;
export const CONSTANTS_VERSION = '2024.1' as const;
