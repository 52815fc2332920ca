export interface SecretStorePort {
  /** Returns the raw credential fields for a tenant's provider account, or null when none are configured. */
  getProviderCredentials(tenantId: string, provider: string): Promise<Record<string, string> | null>;
}
