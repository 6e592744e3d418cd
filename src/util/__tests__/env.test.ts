import {
  getEnvVar,
  getJson,
  getList,
  getNumber,
  getStage,
  getString,
  isLocal,
  isTest,
} from "../../util/env";

describe("env utils", () => {
  const originalEnv = process.env;
  beforeEach(() => {
    process.env = { ...originalEnv };
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  test("stage resolution with STAGE", () => {
    process.env.STAGE = "prod";
    expect(getStage()).toBe("prod");
  });

  test("stage fallback to NODE_ENV", () => {
    delete process.env.STAGE;
    process.env.NODE_ENV = "production";
    expect(getStage()).toBe("prod");
  });

  test("jest runs with NODE_ENV=test", () => {
    expect(isTest()).toBe(true);
  });

  test("isLocal detects absence of lambda env", () => {
    delete process.env.AWS_LAMBDA_FUNCTION_NAME;
    delete process.env.AWS_EXECUTION_ENV;
    expect(isLocal()).toBe(true);
  });

  test("isLocal is false inside lambda", () => {
    process.env.AWS_LAMBDA_FUNCTION_NAME = "nickel-bulletin";
    delete process.env.IS_LOCAL;
    expect(isLocal()).toBe(false);
  });

  test("getEnvVar stageAware picks staged value first", () => {
    process.env.STAGE = "dev";
    process.env.MY_KEY__dev = "staged";
    process.env.MY_KEY = "plain";
    expect(getEnvVar("MY_KEY")).toBe("staged");
    expect(getEnvVar("MY_KEY", { stageAware: false })).toBe("plain");
  });

  test("getEnvVar treats empty string as missing and enforces required", () => {
    process.env.EMPTY_KEY = "";
    expect(getEnvVar("EMPTY_KEY")).toBeUndefined();
    expect(() => getEnvVar("EMPTY_KEY", { required: true })).toThrow(
      "Missing required env var"
    );
  });

  test("getNumber parses and rejects non-numbers", () => {
    process.env.NUMBER_KEY = "42";
    expect(getNumber("NUMBER_KEY")).toBe(42);
    process.env.NUMBER_KEY = "abc";
    expect(() => getNumber("NUMBER_KEY")).toThrow("is not a number");
  });

  test("getString returns default", () => {
    expect(getString("NOPE", "x")).toBe("x");
    expect(getString("NOPE")).toBeUndefined();
  });

  test("getList splits and trims", () => {
    process.env.LIST_KEY = " 5, 20 ,,60 ";
    expect(getList("LIST_KEY")).toEqual(["5", "20", "60"]);
  });

  test("getJson parses and reports invalid payloads", () => {
    process.env.JSON_KEY = '[{"a":1}]';
    expect(getJson("JSON_KEY")).toEqual([{ a: 1 }]);
    process.env.JSON_KEY = "{oops";
    expect(() => getJson("JSON_KEY")).toThrow("is not valid JSON");
  });
});
