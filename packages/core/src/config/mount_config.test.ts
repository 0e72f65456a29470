import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { loadMountConfig, parseMountConfig } from "./mount_config";
import { MountConfigError, isMountConfigError } from "./mount_config.errors";

describe("parseMountConfig", () => {
  it("should resolve roots against the base directory and fill defaults", () => {
    const config = parseMountConfig(
      {
        sources: [
          { name: "base", root: "content" },
          { name: "local", root: "/srv/overrides" },
        ],
        patterns: [{ tag: "doc", pattern: "**/*.md" }],
      },
      "/projects/site"
    );

    expect(config).toEqual({
      sources: [
        { source: "base", root: "/projects/site/content" },
        { source: "local", root: "/srv/overrides" },
      ],
      patterns: [{ tag: "doc", pattern: "**/*.md" }],
      ignore: [],
      logLevel: undefined,
      watch: {},
    });
  });

  it("should report every schema violation", () => {
    let caught: unknown;
    try {
      parseMountConfig({ sources: [], logLevel: "loud", extra: true }, "/base", "/base/unionmount.yaml");
    } catch (error) {
      caught = error;
    }

    expect(isMountConfigError(caught)).toBe(true);
    if (!isMountConfigError(caught)) return;
    expect(caught.configPath).toBe("/base/unionmount.yaml");
    expect(caught.details).toEqual(
      expect.arrayContaining([
        "/ must have required property 'patterns'",
        "/ must NOT have additional properties",
        "/sources must NOT have fewer than 1 items",
        "/logLevel must be equal to one of the allowed values",
      ])
    );
  });

  it("should reject duplicate source names", () => {
    expect(() =>
      parseMountConfig(
        {
          sources: [
            { name: "base", root: "a" },
            { name: "base", root: "b" },
          ],
          patterns: [{ tag: "doc", pattern: "*.md" }],
        },
        "/base"
      )
    ).toThrow(new MountConfigError("Invalid mount configuration", undefined, ["duplicate source name 'base'"]));
  });
});

describe("loadMountConfig", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "mount-config-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should load a YAML file", async () => {
    const configPath = path.join(tempDir, "unionmount.yaml");
    await fs.writeFile(
      configPath,
      [
        "sources:",
        "  - name: base",
        "    root: ./content",
        "patterns:",
        "  - tag: doc",
        "    pattern: '**/*.md'",
        "ignore:",
        "  - 'drafts/**'",
        "logLevel: debug",
        "watch:",
        "  usePolling: true",
        "  interval: 250",
        "",
      ].join("\n")
    );

    await expect(loadMountConfig(configPath)).resolves.toEqual({
      sources: [{ source: "base", root: path.join(tempDir, "content") }],
      patterns: [{ tag: "doc", pattern: "**/*.md" }],
      ignore: ["drafts/**"],
      logLevel: "debug",
      watch: { usePolling: true, interval: 250 },
    });
  });

  it("should load JSON content as well", async () => {
    const configPath = path.join(tempDir, "mount.json");
    await fs.writeFile(
      configPath,
      JSON.stringify({ sources: [{ name: "a", root: "." }], patterns: [{ tag: "any", pattern: "**" }] })
    );

    const config = await loadMountConfig(configPath);

    expect(config.sources).toEqual([{ source: "a", root: tempDir }]);
  });

  it("should fail clearly for a missing file", async () => {
    const configPath = path.join(tempDir, "missing.yaml");

    await expect(loadMountConfig(configPath)).rejects.toThrow(`Config file not found: ${configPath}`);
  });

  it("should fail for malformed YAML", async () => {
    const configPath = path.join(tempDir, "broken.yaml");
    await fs.writeFile(configPath, "sources: [unclosed\n");

    await expect(loadMountConfig(configPath)).rejects.toThrow(/^Failed to parse config file/);
  });
});
