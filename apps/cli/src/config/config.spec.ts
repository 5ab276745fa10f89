import { strict as assert } from "assert";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  CONFIG_KEYS,
  DEFAULTS,
  ENV_MAP,
  ConfigError,
  clearCliOverrides,
  getConfigPath,
  parseSettings,
  readConfigFile,
  resolveConfig,
  setCliOverride,
  updateConfigFile,
} from "./index.js";

describe("config", () => {
  let home: string;
  const savedEnv: Record<string, string | undefined> = {};

  beforeEach(async () => {
    home = await mkdtemp(join(tmpdir(), "reversi-config-"));
    savedEnv.REVERSI_HOME = process.env.REVERSI_HOME;
    process.env.REVERSI_HOME = home;
    for (const key of CONFIG_KEYS) {
      savedEnv[ENV_MAP[key]] = process.env[ENV_MAP[key]];
      delete process.env[ENV_MAP[key]];
    }
  });

  afterEach(async () => {
    clearCliOverrides();
    for (const [name, value] of Object.entries(savedEnv)) {
      if (value === undefined) delete process.env[name];
      else process.env[name] = value;
    }
    await rm(home, { recursive: true, force: true });
  });

  describe("resolveConfig", () => {
    it("should fall back to the defaults without a config file", async () => {
      assert.deepEqual(await resolveConfig(), DEFAULTS);
    });

    it("should read values from the config file", async () => {
      await writeFile(getConfigPath(), JSON.stringify({ logLevel: "info" }));
      const config = await resolveConfig();
      assert.equal(config.logLevel, "info");
      assert.equal(config.boardStyle, "unicode");
    });

    it("should let the environment override the file", async () => {
      await writeFile(getConfigPath(), JSON.stringify({ boardStyle: "unicode" }));
      process.env.REVERSI_BOARD_STYLE = "ascii";
      assert.equal((await resolveConfig()).boardStyle, "ascii");
    });

    it("should let CLI flags override the environment", async () => {
      process.env.REVERSI_FREEZE_ON_GAME_OVER = "false";
      setCliOverride("freezeOnGameOver", "true");
      assert.equal((await resolveConfig()).freezeOnGameOver, "true");
    });

    it("should skip empty environment values", async () => {
      process.env.REVERSI_LOG_LEVEL = "";
      assert.equal((await resolveConfig()).logLevel, "warn");
    });
  });

  describe("readConfigFile", () => {
    it("should keep only known string values", async () => {
      await writeFile(
        getConfigPath(),
        JSON.stringify({ boardStyle: 3, logLevel: "debug", colour: "red" })
      );
      assert.deepEqual(await readConfigFile(), { logLevel: "debug" });
    });

    it("should ignore a file that is not a JSON object", async () => {
      await writeFile(getConfigPath(), JSON.stringify(["ascii"]));
      assert.deepEqual(await readConfigFile(), {});
    });

    it("should ignore a malformed file with a warning", async () => {
      await writeFile(getConfigPath(), "{bad");
      const warnings: string[] = [];
      const original = console.error;
      console.error = (message: string) => {
        warnings.push(message);
      };
      try {
        assert.deepEqual(await readConfigFile(), {});
      } finally {
        console.error = original;
      }
      assert.equal(warnings.length, 1);
      assert.equal(
        warnings[0],
        `Warning: ${getConfigPath()} is malformed and was ignored. ` +
          `Run "reversi config set <key> <value>" to recreate it.`
      );
    });

    it("should write values back through updateConfigFile", async () => {
      await updateConfigFile("boardStyle", "ascii");
      await updateConfigFile("logLevel", "error");
      assert.deepEqual(await readConfigFile(), { boardStyle: "ascii", logLevel: "error" });
    });
  });

  describe("parseSettings", () => {
    it("should convert the defaults", () => {
      assert.deepEqual(parseSettings(DEFAULTS), {
        logLevel: "warn",
        freezeOnGameOver: false,
        boardStyle: "unicode",
      });
    });

    it("should read the freeze flag", () => {
      assert.equal(parseSettings({ ...DEFAULTS, freezeOnGameOver: "true" }).freezeOnGameOver, true);
    });

    it("should reject values outside the allowed set", () => {
      assert.throws(
        () => parseSettings({ ...DEFAULTS, boardStyle: "braille" }),
        (err: unknown) =>
          err instanceof ConfigError &&
          err.message === 'Invalid value for boardStyle: "braille". Expected one of: unicode, ascii'
      );
      assert.throws(() => parseSettings({ ...DEFAULTS, logLevel: "loud" }), ConfigError);
    });
  });
});
