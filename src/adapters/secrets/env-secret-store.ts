import type { SecretStorePort } from "../../ports/secret-store.js";

function envSegment(value: string): string {
  return value.toUpperCase().replace(/[^A-Z0-9]+/g, "_");
}

/**
 * Resolves provider credentials from the environment. A tenant-specific
 * variable (SETTLE_TENANT_<TENANT>_<PROVIDER>_<FIELD>) wins over the shared
 * one (SETTLE_<PROVIDER>_<FIELD>).
 */
export class EnvSecretStore implements SecretStorePort {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async getProviderCredentials(tenantId: string, provider: string): Promise<Record<string, string> | null> {
    const sharedPrefix = `SETTLE_${envSegment(provider)}_`;
    const tenantPrefix = `SETTLE_TENANT_${envSegment(tenantId)}_${envSegment(provider)}_`;
    const credentials: Record<string, string> = {};

    for (const [name, value] of Object.entries(this.env)) {
      if (value === undefined || value.trim().length === 0) {
        continue;
      }
      if (name.startsWith(sharedPrefix)) {
        credentials[name.slice(sharedPrefix.length).toLowerCase()] = value.trim();
      }
    }
    for (const [name, value] of Object.entries(this.env)) {
      if (value === undefined || value.trim().length === 0) {
        continue;
      }
      if (name.startsWith(tenantPrefix)) {
        credentials[name.slice(tenantPrefix.length).toLowerCase()] = value.trim();
      }
    }

    return Object.keys(credentials).length > 0 ? credentials : null;
  }
}
