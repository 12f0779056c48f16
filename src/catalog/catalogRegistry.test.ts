import { describe, expect, it, vi } from "vitest";
import { CatalogRegistry, type CatalogLoader } from "./catalogRegistry.js";
import { CatalogStore } from "./catalogStore.js";
import { inlineSources } from "../__fixtures__/catalogs.js";

const firstStore = CatalogStore.load(inlineSources({}));
const secondStore = CatalogStore.load(inlineSources({}));

describe("CatalogRegistry", () => {
  it("loads once for concurrent first callers", async () => {
    const loader = vi.fn<CatalogLoader>().mockResolvedValue(firstStore);
    const registry = new CatalogRegistry(loader);

    const [a, b] = await Promise.all([registry.current(), registry.current()]);

    expect(a).toBe(firstStore);
    expect(b).toBe(firstStore);
    expect(await registry.current()).toBe(firstStore);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it("swaps the snapshot on reload", async () => {
    const loader = vi.fn<CatalogLoader>().mockResolvedValueOnce(firstStore).mockResolvedValueOnce(secondStore);
    const registry = new CatalogRegistry(loader);

    const before = await registry.current();
    await registry.reload();

    expect(before).toBe(firstStore);
    expect(await registry.current()).toBe(secondStore);
  });

  it("keeps the previous snapshot when a reload fails", async () => {
    const loader = vi
      .fn<CatalogLoader>()
      .mockResolvedValueOnce(firstStore)
      .mockRejectedValueOnce(new Error("products.json is unreadable"));
    const registry = new CatalogRegistry(loader);
    await registry.current();

    await expect(registry.reload()).rejects.toThrow("products.json is unreadable");
    expect(await registry.current()).toBe(firstStore);
  });

  it("retries after a failed first load", async () => {
    const loader = vi
      .fn<CatalogLoader>()
      .mockRejectedValueOnce(new Error("not yet"))
      .mockResolvedValueOnce(firstStore);
    const registry = new CatalogRegistry(loader);

    await expect(registry.current()).rejects.toThrow("not yet");
    expect(await registry.current()).toBe(firstStore);
  });

  it("never lets an earlier load overwrite a later reload", async () => {
    let releaseFirstLoad: (store: CatalogStore) => void = () => undefined;
    const firstLoad = new Promise<CatalogStore>((resolve) => {
      releaseFirstLoad = resolve;
    });
    const loader = vi.fn<CatalogLoader>().mockReturnValueOnce(firstLoad).mockResolvedValueOnce(secondStore);
    const registry = new CatalogRegistry(loader);

    const initial = registry.current();
    expect(await registry.reload()).toBe(secondStore);
    releaseFirstLoad(firstStore);

    expect(await initial).toBe(secondStore);
    expect(await registry.current()).toBe(secondStore);
  });

  it("serves a seeded store without loading", async () => {
    expect(await CatalogRegistry.fromStore(secondStore).current()).toBe(secondStore);
  });
});
