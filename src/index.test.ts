import { describe, it, expect, vi, afterEach } from "vitest";
import { APP_NAME, APP_VERSION, main } from "./index.js";

describe("Project setup", () => {
  it("should export app name", () => {
    expect(APP_NAME).toBe("Poise Meter");
  });

  it("should export app version", () => {
    expect(APP_VERSION).toBe("0.1.0");
  });
});

describe("main", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("refuses to start without a classifier endpoint", async () => {
    const fatal = vi.spyOn(console, "error").mockImplementation(() => {});

    expect(await main({})).toBeNull();
    expect(fatal).toHaveBeenCalledWith(expect.stringContaining("CLASSIFIER_URL is not set. Add it to your .env file."));
  });

  it("refuses to start with invalid configuration", async () => {
    const fatal = vi.spyOn(console, "error").mockImplementation(() => {});

    expect(await main({ CLASSIFIER_URL: "http://localhost:5001/analyze", PORT: "eighty" })).toBeNull();
    expect(fatal).toHaveBeenCalledWith(expect.stringContaining('Invalid PORT: "eighty"'));
  });
});
