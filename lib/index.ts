export * from '@/lib/notation';
export * from '@/lib/errors';
export * from '@/lib/config';
export * from '@/lib/decode-rally';
export * from '@/lib/decode-serve';
export * from '@/lib/shot-sequence';
export * from '@/lib/rally-analyzer';
export * from '@/lib/describe-point';
export * from '@/lib/stats-calculator';
export * from '@/lib/parse-points';
export * from '@/lib/parse-score';
export * from '@/lib/match-data';
export type * from '@/types/shot-data';
export type * from '@/types/match-data';
