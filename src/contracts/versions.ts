export const ENGINE_VERSION = 'ku-permafrost-engine@1.0.0' as const;
export const CONTRACT_VERSION = 'PermafrostOutputV1' as const;
