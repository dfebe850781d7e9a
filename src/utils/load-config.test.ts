import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";

describe("loadDefaultConfig", () => {
  it("loads the bundled defaults", async () => {
    const config = await loadDefaultConfig();

    expect(config.images).toMatchObject({
      directory: "anime_images",
      attempts: 3,
      retryDelay: 1000,
      timeout: 15000,
    });
    expect(config.api).toEqual({
      baseUrl: "https://api.jikan.moe/v4",
      requestDelay: 500,
      rateLimitDelay: 2000,
      timeout: 10000,
    });
    expect(config.display.placeholder).toBe("Image not available");
  });
});

describe("mergeConfig", () => {
  it("merges sections key by key", async () => {
    const base = await loadDefaultConfig();
    const merged = mergeConfig(base, {
      images: { directory: "posters", headers: { "User-Agent": "test-agent" } },
      logging: { level: "debug" },
    });

    expect(merged.images.directory).toBe("posters");
    expect(merged.images.attempts).toBe(3);
    expect(merged.images.headers).toEqual({
      "User-Agent": "test-agent",
      Accept: "image/webp,image/apng,image/*,*/*;q=0.8",
    });
    expect(merged.logging.level).toBe("debug");
    expect(merged.api).toEqual(base.api);
  });
});

describe("loadConfig", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("applies a custom config file", async () => {
    dir = await mkdtemp(join(tmpdir(), "load-config-"));
    const customPath = join(dir, "custom.json");
    await writeFile(customPath, JSON.stringify({ images: { directory: "posters" } }));

    const { config, errors } = await loadConfig(customPath);

    expect(errors.filter((e) => e.path === customPath)).toEqual([]);
    expect(config.images.directory).toBe("posters");
  });

  it("reports an invalid custom config and keeps the previous values", async () => {
    dir = await mkdtemp(join(tmpdir(), "load-config-"));
    const customPath = join(dir, "custom.json");
    await writeFile(customPath, JSON.stringify({ api: { requestDelay: 100 } }));

    const { config, errors } = await loadConfig(customPath);

    expect(errors.map((e) => e.path)).toContain(customPath);
    expect(config.api.requestDelay).toBeGreaterThanOrEqual(500);
  });

  it("reports a missing custom config", async () => {
    const missing = join(tmpdir(), "anime-images-missing-config.json");

    const { errors } = await loadConfig(missing);

    expect(errors.map((e) => e.path)).toContain(missing);
  });
});
