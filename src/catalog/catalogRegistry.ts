import { CatalogStore, loadCatalogStoreFromFiles, type CatalogPaths } from "./catalogStore.js";

export type CatalogLoader = () => Promise<CatalogStore>;

/**
 * Holds the process-wide catalog snapshot. The first `current()` call loads it; every
 * later call returns the same immutable store. `reload()` builds a complete new store
 * and only then swaps the reference, so a quotation in flight never sees a
 * half-updated catalog. Loads are numbered as they start; a load never replaces the
 * result of one that started after it.
 */
export class CatalogRegistry {
  private snapshot: CatalogStore | null = null;
  private pending: Promise<CatalogStore> | null = null;
  private startedLoads = 0;
  private installedLoad = 0;

  constructor(private readonly loader: CatalogLoader) {}

  static fromFiles(paths: CatalogPaths): CatalogRegistry {
    return new CatalogRegistry(() => loadCatalogStoreFromFiles(paths));
  }

  static fromStore(store: CatalogStore): CatalogRegistry {
    const registry = new CatalogRegistry(async () => store);
    registry.snapshot = store;
    return registry;
  }

  async current(): Promise<CatalogStore> {
    if (this.snapshot) return this.snapshot;
    if (!this.pending) {
      const load = ++this.startedLoads;
      this.pending = this.loader()
        .then((store) => this.install(load, store))
        .finally(() => {
          this.pending = null;
        });
    }
    return this.pending;
  }

  private install(load: number, store: CatalogStore): CatalogStore {
    if (load > this.installedLoad || !this.snapshot) {
      this.installedLoad = load;
      this.snapshot = store;
      return store;
    }
    console.warn(`[CatalogRegistry] Discarding catalog load #${load}, superseded by #${this.installedLoad}`);
    return this.snapshot;
  }

  async reload(): Promise<CatalogStore> {
    console.log("[CatalogRegistry] Reloading catalogs");
    try {
      const load = ++this.startedLoads;
      return this.install(load, await this.loader());
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[CatalogRegistry] Reload failed, keeping previous snapshot: ${message}`);
      throw error;
    }
  }
}
