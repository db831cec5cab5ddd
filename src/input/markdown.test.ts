import { describe, expect, test } from "vitest";

import { detectMarkdownFormat, parseMarkdown, validateMarkdownFormat } from "./markdown";

const PLAN = [
  "# Project: Billing Service",
  "",
  "## Phase 1: Foundations",
  "- [ ] TASK-101: Add invoice model",
  "  - Priority: high",
  "  - Description: Persist invoices",
  "- [x] Seed fixtures",
  "    - [ ] Verify fixtures",
  "",
  "## Reporting",
  "- [ ] TASK-201: Monthly report",
  "  Dependencies: TASK-101, TASK-103",
  "",
].join("\n");

const PRD = [
  "# Checkout PRD",
  "",
  "## Overview",
  "Some context.",
  "",
  "## User Stories",
  "### US-001: Pay by card",
  "**Status:** Completed",
  "**Priority:** High",
  "#### Acceptance Criteria",
  "- [x] Card form validates",
  "- [ ] Receipt is emailed",
  "### US-002: Save card",
  "**Status:** In Progress",
  "**Dependencies:** US-001",
  "### Refund order",
  "**Priority:** 5",
].join("\n");

describe("parseMarkdown", () => {
  test("reads phases, tasks and metadata from a plan", () => {
    const draft = parseMarkdown(PLAN, "plan.md");

    expect(draft.name).toBe("Billing Service");
    expect(draft.phases).toEqual([
      {
        id: "phase-1",
        name: "Foundations",
        priority: 0,
        source: { file: "plan.md", line: 3 },
        tasks: [
          {
            id: "TASK-101",
            name: "Add invoice model",
            description: "Persist invoices",
            status: "pending",
            priority: 1,
            dependencies: [],
            phaseId: "phase-1",
            attempts: 0,
            source: { file: "plan.md", line: 4 },
          },
          {
            id: "TASK-102",
            name: "Seed fixtures",
            description: "",
            status: "completed",
            priority: 1,
            dependencies: [],
            phaseId: "phase-1",
            attempts: 0,
            source: { file: "plan.md", line: 7 },
          },
          {
            id: "TASK-103",
            name: "Verify fixtures",
            description: "",
            status: "pending",
            priority: 2,
            dependencies: ["TASK-102"],
            phaseId: "phase-1",
            attempts: 0,
            source: { file: "plan.md", line: 8 },
          },
        ],
      },
      {
        id: "phase-2",
        name: "Reporting",
        priority: 1,
        source: { file: "plan.md", line: 10 },
        tasks: [
          {
            id: "TASK-201",
            name: "Monthly report",
            description: "",
            status: "pending",
            priority: 0,
            dependencies: ["TASK-101", "TASK-103"],
            phaseId: "phase-2",
            attempts: 0,
            source: { file: "plan.md", line: 11 },
          },
        ],
      },
    ]);
  });

  test("reads user stories from a PRD and drops sections without stories", () => {
    const draft = parseMarkdown(PRD, "prd.md");

    expect(draft.name).toBe("Checkout PRD");
    expect(draft.phases).toHaveLength(1);
    expect(draft.phases[0]).toMatchObject({
      id: "phase-1",
      name: "User Stories",
      priority: 0,
      source: { file: "prd.md", line: 6 },
    });
    expect(draft.phases[0]?.tasks).toEqual([
      {
        id: "US-001",
        name: "Pay by card",
        description: "- [x] Card form validates\n- [ ] Receipt is emailed",
        status: "pending",
        priority: 1,
        dependencies: [],
        phaseId: "phase-1",
        attempts: 0,
        source: { file: "prd.md", line: 7 },
      },
      {
        id: "US-002",
        name: "Save card",
        description: "",
        status: "in_progress",
        priority: 1,
        dependencies: ["US-001"],
        phaseId: "phase-1",
        attempts: 0,
        source: { file: "prd.md", line: 13 },
      },
      {
        id: "TASK-103",
        name: "Refund order",
        description: "",
        status: "pending",
        priority: 5,
        dependencies: [],
        phaseId: "phase-1",
        attempts: 0,
        source: { file: "prd.md", line: 16 },
      },
    ]);
  });

  test("keeps a completed story when every criterion is checked", () => {
    const draft = parseMarkdown(
      ["# Shop", "## User Stories", "### US-7: Wishlist", "**Status:** Completed", "#### Acceptance Criteria", "- [x] Saved"].join("\n"),
    );

    expect(draft.phases[0]?.tasks[0]).toMatchObject({ status: "completed", description: "- [x] Saved" });
  });

  test("strips carriage returns and falls back to a default name", () => {
    const draft = parseMarkdown("## Work\r\n- [ ] A-1: first\r\n");

    expect(draft.name).toBe("Unnamed Project");
    expect(draft.phases[0]?.tasks[0]).toMatchObject({ id: "A-1", name: "first" });
    expect(draft.phases[0]?.tasks[0]?.source).toBeUndefined();
  });
});

describe("detectMarkdownFormat", () => {
  test("tells plans, PRDs and other documents apart", () => {
    expect(detectMarkdownFormat(PLAN)).toBe("plan");
    expect(detectMarkdownFormat(PRD)).toBe("prd");
    expect(detectMarkdownFormat("# Notes\n## Ideas\nNothing yet.\n")).toBe("unknown");
  });
});

describe("validateMarkdownFormat", () => {
  test("accepts a well-formed plan", () => {
    expect(validateMarkdownFormat(PLAN)).toEqual([]);
  });

  test("lists structural problems", () => {
    expect(validateMarkdownFormat("just text\n")).toEqual([
      "Missing project title (# heading)",
      "No phase headers found (## headings)",
      "No tasks found (checkbox items or user stories)",
    ]);
  });

  test("reports duplicate ids", () => {
    expect(validateMarkdownFormat("# T\n## P\n- [ ] A-1: x\n- [ ] A-1: y\n")).toEqual([
      "Duplicate task ID: A-1",
    ]);
    expect(validateMarkdownFormat("# T\n## Stories\n### US-1: a\n### US-1: b\n")).toEqual([
      "PRD missing 'User Stories' section",
      "Duplicate user story ID: US-1",
    ]);
  });
});
