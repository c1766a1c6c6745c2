export type SecretData = Record<string, string>;

export interface SecretsHealth {
  initialized: boolean;
  sealed: boolean;
  version?: string;
}

export interface TokenInfo {
  ttl_s: number;
  renewable: boolean;
  policies: string[];
}

/**
 * Key/value secrets store. Paths are relative to the store's own prefix; a missing
 * secret or key is undefined, never an error.
 */
export interface SecretsStore {
  get(path: string): Promise<SecretData | undefined>;
  put(path: string, value: SecretData): Promise<void>;
  /** Removes every version of the secret. */
  delete(path: string): Promise<void>;
  /** Child names under the prefix; sub-folders end with "/". */
  list(prefix: string): Promise<string[]>;
  health(): Promise<SecretsHealth>;
  /** Mount paths the token can see, each ending with "/". */
  listMounts(): Promise<string[]>;
  lookupToken(): Promise<TokenInfo>;
  renewToken(): Promise<TokenInfo>;
}

export const MUTATING_SECRETS_METHODS = ["put", "delete", "renewToken"] as const;
