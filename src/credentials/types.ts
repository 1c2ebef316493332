export interface Credential {
  identity: string;
  token: string;
}

/** Parse-ordered, frozen after load. */
export type CredentialSet = readonly Readonly<Credential>[];

export interface AuthVerdict {
  authorized: boolean;
  identity?: string;
}

export interface DuplicateToken {
  /** Identity that wins lookups for the shared token */
  identity: string;
  /** Identities shadowed by the first one */
  shadowed: string[];
}
