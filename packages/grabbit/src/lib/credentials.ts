import Conf from "conf";

export interface StoredCredentials {
  imgurClientId?: string;
}

export interface CredentialStore {
  getCredentials(): StoredCredentials;
  setImgurClientId(clientId: string): void;
  clearCredentials(): void;
  /** Where the credentials live, for display */
  readonly location: string;
}

export interface ConfCredentialStoreOptions {
  /** Directory to keep the file in; defaults to the OS config directory */
  cwd?: string;
}

export class ConfCredentialStore implements CredentialStore {
  private readonly conf: Conf<StoredCredentials>;

  constructor({ cwd }: ConfCredentialStoreOptions = {}) {
    this.conf = new Conf<StoredCredentials>({ projectName: "grabbit", configName: "credentials", cwd });
  }

  get location(): string {
    return this.conf.path;
  }

  getCredentials(): StoredCredentials {
    return { imgurClientId: this.conf.get("imgurClientId") };
  }

  setImgurClientId(clientId: string): void {
    if (clientId.trim() === "") {
      throw new Error("Client ID must not be empty.");
    }
    this.conf.set("imgurClientId", clientId.trim());
  }

  clearCredentials(): void {
    this.conf.clear();
  }
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export const IMGUR_CLIENT_ID_ENV = "GRABBIT_IMGUR_CLIENT_ID";

export type CredentialSource = "config" | "stored" | "environment";

export interface ResolvedCredential {
  value: string;
  source: CredentialSource;
}

/**
 * Pick the Imgur client ID: flag or config file first, then the stored
 * credential, then the environment.
 */
export function resolveImgurClientId(
  configured: string | undefined,
  store: CredentialStore,
  env: NodeJS.ProcessEnv = process.env
): ResolvedCredential | undefined {
  if (configured) return { value: configured, source: "config" };

  const stored = store.getCredentials().imgurClientId;
  if (stored) return { value: stored, source: "stored" };

  const fromEnv = env[IMGUR_CLIENT_ID_ENV];
  if (fromEnv) return { value: fromEnv, source: "environment" };

  return undefined;
}

/** Show only the first four characters of a client ID */
export function maskClientId(clientId: string): string {
  return clientId.length <= 4 ? "****" : `${clientId.slice(0, 4)}${"*".repeat(clientId.length - 4)}`;
}
