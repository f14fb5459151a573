import type { HashParams, Principal } from "@keyshift/shared";
import { AuthError, CredentialKind, formatZodError, principalIdSchema } from "@keyshift/shared";
import { DEFAULT_HASH_PARAMS, hashSecret, verifySecret } from "../crypto/argon2.js";
import { generateSessionToken } from "../crypto/random.js";
import type { SqliteStore } from "../storage/sqlite-store.js";

export interface InitialSecrets {
  pin: string;
  password: string;
}

/**
 * Maps principals to Argon2id hashes of their secrets, one per credential kind.
 * Plaintext secrets are never stored or returned.
 */
export class CredentialStore {
  private dummyHash: Promise<string> | null = null;

  constructor(
    private readonly store: SqliteStore,
    private readonly params: HashParams = DEFAULT_HASH_PARAMS,
  ) {}

  /**
   * True iff `candidate` matches the stored secret of this kind. Unknown
   * principals are checked against a throwaway hash so they cost the same.
   */
  async verify(principalId: string, kind: CredentialKind, candidate: string): Promise<boolean> {
    const credential = this.store.getCredential(principalId, kind);
    if (!credential) {
      await verifySecret(await this.getDummyHash(), candidate);
      return false;
    }
    return verifySecret(credential.secret_hash, candidate);
  }

  /** Hash and store a new secret. Throws PRINCIPAL_NOT_FOUND if there is nothing to replace. */
  async replace(principalId: string, kind: CredentialKind, newSecret: string): Promise<void> {
    const encoded = await this.hashSecret(newSecret);
    this.replaceHash(principalId, kind, encoded);
  }

  hashSecret(secret: string): Promise<string> {
    return hashSecret(secret, this.params);
  }

  /** Store an already computed hash; usable inside a store transaction. */
  replaceHash(principalId: string, kind: CredentialKind, encoded: string): void {
    if (!this.store.updateCredentialHash(principalId, kind, encoded, Date.now())) {
      throw AuthError.principalNotFound(principalId);
    }
  }

  async createPrincipal(id: string, secrets: InitialSecrets): Promise<Principal> {
    const parsed = principalIdSchema.safeParse(id);
    if (!parsed.success) {
      throw AuthError.schemaValidation(formatZodError(parsed.error));
    }
    const principalId = parsed.data;

    if (this.store.getPrincipal(principalId)) {
      throw AuthError.duplicatePrincipal(principalId);
    }

    const pinHash = await this.hashSecret(secrets.pin);
    const passwordHash = await this.hashSecret(secrets.password);
    const now = Date.now();
    const principal: Principal = { id: principalId, created_at: now, updated_at: now };

    this.store.transaction(() => {
      if (this.store.getPrincipal(principalId)) {
        throw AuthError.duplicatePrincipal(principalId);
      }
      this.store.insertPrincipal(principal);
      this.store.upsertCredential({
        principal_id: principalId,
        kind: CredentialKind.PIN,
        secret_hash: pinHash,
        updated_at: now,
      });
      this.store.upsertCredential({
        principal_id: principalId,
        kind: CredentialKind.PASSWORD,
        secret_hash: passwordHash,
        updated_at: now,
      });
    });

    return principal;
  }

  getPrincipal(principalId: string): Principal | undefined {
    return this.store.getPrincipal(principalId);
  }

  private getDummyHash(): Promise<string> {
    this.dummyHash ??= this.hashSecret(generateSessionToken());
    return this.dummyHash;
  }
}
