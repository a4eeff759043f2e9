import { describe, it, expect } from "vitest";
import { createProjectConfig, describeConfig } from "../project-config.js";
import { ConfigurationError } from "../../errors/index.js";

const NOW = new Date("2026-01-01T00:00:00Z");

describe("createProjectConfig", () => {
  it("fills defaults and leaves selections empty", () => {
    const config = createProjectConfig({ name: " demo " }, {}, NOW);

    expect(config).toEqual({
      name: "demo",
      here: false,
      ai: "",
      script: "",
      force: false,
      noGit: false,
      ignoreAgentTools: false,
      skipTls: false,
      debug: false,
      githubToken: undefined,
      createdAt: NOW,
    });
  });

  it("prefers the flag token, then GH_TOKEN, then GITHUB_TOKEN", () => {
    const env = { GH_TOKEN: "gh-test-secret", GITHUB_TOKEN: "github-test-secret" };

    expect(createProjectConfig({ githubToken: "flag-test-secret" }, env, NOW).githubToken).toBe("flag-test-secret");
    expect(createProjectConfig({}, env, NOW).githubToken).toBe("gh-test-secret");
    expect(createProjectConfig({}, { GITHUB_TOKEN: "github-test-secret" }, NOW).githubToken).toBe(
      "github-test-secret",
    );
    expect(createProjectConfig({}, { GH_TOKEN: "  " }, NOW).githubToken).toBeUndefined();
  });

  it("rejects an empty flag value", () => {
    expect(() => createProjectConfig({ ai: "  " }, {}, NOW)).toThrow(ConfigurationError);
    expect(() => createProjectConfig({ ai: "  " }, {}, NOW)).toThrow(/^Invalid init options: ai: /);
  });
});

describe("describeConfig", () => {
  it("redacts the token", () => {
    const config = createProjectConfig({ here: true, githubToken: "test-secret" }, {}, NOW);

    expect(describeConfig(config)).toEqual({
      name: "(current directory)",
      here: true,
      ai: "(prompt)",
      script: "(prompt)",
      force: false,
      noGit: false,
      ignoreAgentTools: false,
      skipTls: false,
      githubToken: "<redacted>",
    });
  });
});
