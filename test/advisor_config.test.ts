import { describe, it, expect } from "vitest";

import { envBool, loadAdvisorConfig } from "../src/control-plane/advisor_config";

describe("loadAdvisorConfig", () => {
  it("uses defaults for an empty environment", () => {
    const config = loadAdvisorConfig({});

    expect(config.router).toEqual({
      mode: "semantic_enforce",
      policyVersion: "v1",
      intentConfMin: 0.7,
      top2GapMin: 0.15,
      scenarioConfMin: 0.75,
      maxClarifyQuestions: 2,
      extractionRetries: 1,
    });
    expect(config.response.mode).toBe("llm_enforce");
    expect(config.tools.gatewayEndpoint).toBe("");
    expect(config.tools.kbId).toBe("");
    expect(config.auditEndpoint).toBe("");
  });

  it("normalises modes and the gateway path", () => {
    const config = loadAdvisorConfig({
      ROUTER_MODE: "RULE",
      RESPONSE_MODE: "Template",
      TOOL_GATEWAY_ENDPOINT: "http://gw.internal/",
    });

    expect(config.router.mode).toBe("rule");
    expect(config.response.mode).toBe("template");
    expect(config.tools.gatewayEndpoint).toBe("http://gw.internal/mcp");
    expect(loadAdvisorConfig({ TOOL_GATEWAY_ENDPOINT: "http://gw.internal/mcp" }).tools.gatewayEndpoint).toBe(
      "http://gw.internal/mcp"
    );
  });

  it("clamps out-of-range numbers and ignores garbage", () => {
    const config = loadAdvisorConfig({
      RESPONSE_MAX_RETRIES: "5",
      ROUTER_INTENT_CONF_MIN: "high",
      ROUTER_MAX_CLARIFY_QUESTIONS: "0",
      TOOL_MAX_WORKERS: "-3",
      ROUTER_MODE: "sometimes",
    });

    expect(config.response.maxRetries).toBe(1);
    expect(config.router.intentConfMin).toBe(0.7);
    expect(config.router.maxClarifyQuestions).toBe(1);
    expect(config.tools.maxWorkers).toBe(1);
    expect(config.router.mode).toBe("semantic_enforce");
  });

  it("returns a frozen config", () => {
    expect(Object.isFrozen(loadAdvisorConfig({}).tools)).toBe(true);
  });
});

describe("envBool", () => {
  it("reads common spellings", () => {
    expect(envBool({ FLAG: "yes" }, "FLAG", false)).toBe(true);
    expect(envBool({ FLAG: "off" }, "FLAG", true)).toBe(false);
    expect(envBool({ FLAG: "maybe" }, "FLAG", true)).toBe(true);
  });
});
