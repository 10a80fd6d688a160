import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import {
  VariablesError,
  loadVariables,
  parseAssignments,
  resolveVariables,
} from "./vars.js";

const variablesError = async (
  f: () => Promise<unknown>,
): Promise<VariablesError> => {
  try {
    await f();
  } catch (e) {
    if (e instanceof VariablesError) return e;
    throw e;
  }
  throw Error("expected a variables error");
};

describe("parseAssignments", () => {
  test("later assignments win", () => {
    expect([...parseAssignments(["x=1", " y = -2.5 ", "x=3"])]).toEqual([
      ["x", 3],
      ["y", -2.5],
    ]);
  });

  test("dotted name and exponent", () => {
    expect(parseAssignments(["state.a=1e-3"]).get("state.a")).toBe(0.001);
  });

  test("missing equals sign", async () => {
    const error = await variablesError(async () => parseAssignments(["x"]));
    expect(error.data).toEqual({ source: "x", reason: "expected name=value" });
    expect(error.message).toBe("x: expected name=value");
  });

  test("missing name", async () => {
    const error = await variablesError(async () => parseAssignments(["=1"]));
    expect(error.data.reason).toBe("expected name=value");
  });

  test("not a number", async () => {
    const error = await variablesError(async () => parseAssignments(["x=abc"]));
    expect(error.data).toEqual({ source: "x=abc", reason: 'not a number: "abc"' });
  });

  test("empty value", async () => {
    const error = await variablesError(async () => parseAssignments(["x="]));
    expect(error.data.reason).toBe('not a number: ""');
  });
});

describe("files", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "exprkit-"));
    await writeFile(join(dir, "good.json"), '{"x": 2, "y.z": 0.5}');
    await writeFile(join(dir, "string.json"), '{"x": "two"}');
    await writeFile(join(dir, "broken.json"), '{"x": ');
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("load", async () => {
    expect([...(await loadVariables(join(dir, "good.json")))]).toEqual([
      ["x", 2],
      ["y.z", 0.5],
    ]);
  });

  test("value that is not a number", async () => {
    const file = join(dir, "string.json");
    const error = await variablesError(() => loadVariables(file));
    expect(error.data.source).toBe(file);
    expect(error.data.reason).toMatch(/Expected a number/u);
  });

  test("malformed JSON", async () => {
    const file = join(dir, "broken.json");
    expect((await variablesError(() => loadVariables(file))).data.source).toBe(
      file,
    );
  });

  test("missing file", async () => {
    const file = join(dir, "missing.json");
    const error = await variablesError(() => loadVariables(file));
    expect(error.data.reason).toMatch(/ENOENT/u);
  });

  test("assignments override the file", async () => {
    const vars = await resolveVariables(join(dir, "good.json"), ["x=5"]);
    expect(vars.get("x")).toBe(5);
    expect(vars.get("y.z")).toBe(0.5);
  });

  test("no file", async () => {
    expect([...(await resolveVariables(undefined, ["a=1"]))]).toEqual([
      ["a", 1],
    ]);
  });
});
