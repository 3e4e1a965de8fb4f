// Storage partition of each pipeline module. Adapters name an upstream
// namespace through these constants, never through the other module's code.
export const NAMESPACES = {
    intake: 'intake',
    strategy: 'strategy',
    production: 'production',
    qc: 'qc',
    delivery: 'delivery',
} as const;
