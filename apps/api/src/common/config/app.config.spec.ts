/**
 * App Config Tests
 */

import { ConfigModule } from "@nestjs/config";
import { Test } from "@nestjs/testing";
import { AppConfigModule } from "./app-config.module";
import { AppConfigService, validateEnv } from "./app.config";

describe("AppConfigService", () => {
  const keys = ["HENRIK_TIMEOUT_MS", "HENRIK_API_BASE_URL", "CORS_ORIGINS"] as const;
  let previous: Record<string, string | undefined>;

  beforeEach(() => {
    previous = Object.fromEntries(keys.map((key) => [key, process.env[key]]));
  });

  afterEach(() => {
    for (const [key, value] of Object.entries(previous)) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  async function compile(env: Record<string, string>): Promise<AppConfigService> {
    Object.assign(process.env, env);
    const module = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true, validate: validateEnv }),
        AppConfigModule,
      ],
    }).compile();
    return module.get(AppConfigService);
  }

  it("should serve validated numbers, not the raw environment strings", async () => {
    const config = await compile({ HENRIK_TIMEOUT_MS: "2500" });

    expect(config.henrik.timeoutMs).toBe(2500);
  });

  it("should trim trailing slashes and split origins", async () => {
    const config = await compile({
      HENRIK_API_BASE_URL: "https://stats.test/valorant//",
      CORS_ORIGINS: "http://a.test, http://b.test,",
    });

    expect(config.henrik.baseUrl).toBe("https://stats.test/valorant");
    expect(config.corsOrigins).toEqual(["http://a.test", "http://b.test"]);
  });

  it("should reject an invalid value", () => {
    expect(() => validateEnv({ HENRIK_TIMEOUT_MS: "soon" })).toThrow(
      "Invalid environment configuration: HENRIK_TIMEOUT_MS: Expected number, received nan",
    );
  });
});
