import { loadConfig, requireCredentials } from "../config";
import { ConfigError } from "../errors";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      erpnext: {
        baseUrl: "http://localhost:8000",
        apiKey: "",
        apiSecret: "",
        timeoutMs: 30000,
        maxAttempts: 3,
        retryDelayMs: 2000,
      },
      dataDir: "./data",
      outputDir: "./data/output",
      export: { author: "", version: "1.0.0" },
      pdfMaxBytes: 50 * 1024 * 1024,
      batchConcurrency: 1,
      apiPort: 3001,
    });
  });

  it("reads and coerces environment values", () => {
    const config = loadConfig({
      ERPNEXT_URL: "https://erp.example.test//",
      ERPNEXT_API_KEY: "test-key",
      ERPNEXT_API_SECRET: "test-secret",
      UPLOAD_MAX_ATTEMPTS: "5",
      UPLOAD_RETRY_DELAY_MS: "0",
      PDF_MAX_SIZE_MB: "2",
      BATCH_CONCURRENCY: " ",
    });
    expect(config.erpnext).toMatchObject({ baseUrl: "https://erp.example.test", maxAttempts: 5, retryDelayMs: 0 });
    expect(config.pdfMaxBytes).toBe(2 * 1024 * 1024);
    expect(config.batchConcurrency).toBe(1);
  });

  it("names the offending keys", () => {
    expect.assertions(2);
    try {
      loadConfig({ UPLOAD_MAX_ATTEMPTS: "0", ERPNEXT_URL: "not a url" });
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      if (e instanceof ConfigError) expect(e.keys.sort()).toEqual(["ERPNEXT_URL", "UPLOAD_MAX_ATTEMPTS"]);
    }
  });
});

describe("requireCredentials", () => {
  it("lists missing credentials", () => {
    expect(() => requireCredentials(loadConfig({ ERPNEXT_API_KEY: "test-key" }))).toThrow(
      "Missing ERPNext credentials: ERPNEXT_API_SECRET"
    );
  });

  it("returns the ERPNext settings when both are present", () => {
    const erp = requireCredentials(loadConfig({ ERPNEXT_API_KEY: "test-key", ERPNEXT_API_SECRET: "test-secret" }));
    expect(erp.apiKey).toBe("test-key");
  });
});
