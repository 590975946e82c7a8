export type SigningAlgorithm = 'HS256' | 'HS384' | 'HS512';

export const SIGNING_ALGORITHMS: readonly SigningAlgorithm[] = [
  'HS256',
  'HS384',
  'HS512',
];

export const isSigningAlgorithm = (value: unknown): value is SigningAlgorithm =>
  SIGNING_ALGORITHMS.some((algorithm) => algorithm === value);

export interface AuthSettings {
  readonly signingSecret: string;
  readonly signingAlgorithm: SigningAlgorithm;
  readonly accessTokenTtlSeconds: number;
  readonly refreshTokenTtlSeconds: number;
}
