import { describe, expect, test } from "vitest";

import { findExecutable, resolveCommandForSpawn } from "./command-resolver";

describe("resolveCommandForSpawn", () => {
  test("keeps command unchanged on non-windows", () => {
    expect(resolveCommandForSpawn("codex", {}, "linux", () => false)).toBe("codex");
  });

  test("resolves windows command via PATH/PATHEXT", () => {
    const expected = "c:\\bin\\codex.cmd";
    const resolved = resolveCommandForSpawn(
      "codex",
      {
        Path: "C:\\tools;C:\\bin",
        PATHEXT: ".EXE;.CMD",
      },
      "win32",
      (candidate) => candidate.replace(/\//g, "\\").toLowerCase() === expected,
    );

    expect(resolved.replace(/\//g, "\\").toLowerCase()).toBe(expected);
  });

  test("keeps explicit extension command on windows", () => {
    expect(
      resolveCommandForSpawn("codex.cmd", { Path: "C:\\tools" }, "win32", () => false),
    ).toBe("codex.cmd");
  });
});

describe("findExecutable", () => {
  test("finds a bare command on PATH", () => {
    const found = findExecutable("claude", {
      env: { PATH: "/usr/bin:/opt/agents/bin" },
      platform: "linux",
      exists: (candidate) => candidate === "/opt/agents/bin/claude",
    });

    expect(found).toBe("/opt/agents/bin/claude");
  });

  test("returns undefined when nothing matches", () => {
    expect(
      findExecutable("gemini", {
        env: { PATH: "/usr/bin" },
        platform: "linux",
        exists: () => false,
      }),
    ).toBeUndefined();
  });

  test("checks explicit paths directly", () => {
    expect(
      findExecutable("./bin/agent", {
        env: {},
        platform: "linux",
        exists: (candidate) => candidate === "./bin/agent",
      }),
    ).toBe("./bin/agent");
  });
});
