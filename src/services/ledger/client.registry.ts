import { LedgerRepository } from './ledger.types';

/**
 * Immutable provisioning table (client id → limit), read from the store once.
 * Clients are never created at runtime, so membership checks need no I/O
 * after the first load.
 */
export class ClientRegistry {
  private limits: ReadonlyMap<number, number> | null = null;
  private loading: Promise<ReadonlyMap<number, number>> | null = null;

  constructor(private readonly repository: LedgerRepository) {}

  async load(): Promise<void> {
    await this.getLimits();
  }

  async has(clientId: number): Promise<boolean> {
    return (await this.getLimits()).has(clientId);
  }

  async limitOf(clientId: number): Promise<number | undefined> {
    return (await this.getLimits()).get(clientId);
  }

  ids(): number[] {
    return this.limits ? [...this.limits.keys()] : [];
  }

  isLoaded(): boolean {
    return this.limits !== null;
  }

  /**
   * Forget the loaded table; the next lookup reads the store again
   */
  invalidate(): void {
    this.limits = null;
    this.loading = null;
  }

  private async getLimits(): Promise<ReadonlyMap<number, number>> {
    if (this.limits) return this.limits;

    if (!this.loading) {
      this.loading = this.repository
        .listClients()
        .then((clients) => {
          const limits = new Map(clients.map((client) => [client.clientId, client.limit]));
          this.limits = limits;
          return limits;
        })
        .catch((error: unknown) => {
          // Allow the next lookup to retry the load
          this.loading = null;
          throw error;
        });
    }

    return this.loading;
  }
}
