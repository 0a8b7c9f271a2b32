import { describe, expect, it } from "vitest";
import { parseProjectsOutput, parseTasksOutput } from "../../discovery.js";

describe("parseProjectsOutput", () => {
  it("lists the root once and every subproject", () => {
    const output = [
      "",
      "Root project 'shop'",
      "+--- Project ':api'",
      "\\--- Project ':web'",
      "     \\--- Project ':web:assets'",
      "",
    ].join("\n");

    expect(parseProjectsOutput(output, "/work/shop")).toEqual([
      { name: ":", path: "/work/shop", description: "Root project" },
      { name: ":api", path: "/work/shop" },
      { name: ":web", path: "/work/shop" },
      { name: ":web:assets", path: "/work/shop" },
    ]);
  });

  it("handles a single-project build", () => {
    expect(parseProjectsOutput("Root project 'solo'\nNo sub-projects\n", "/solo")).toEqual([
      { name: ":", path: "/solo", description: "Root project" },
    ]);
  });

  it("returns nothing for empty output", () => {
    expect(parseProjectsOutput("", "/x")).toEqual([]);
  });
});

describe("parseTasksOutput", () => {
  const output = [
    "",
    "------------------------------------------------------------",
    "Tasks runnable from root project 'shop'",
    "------------------------------------------------------------",
    "",
    "Build tasks",
    "-----------",
    "assemble - Assembles the outputs of this project.",
    "build - Assembles and tests this project.",
    "",
    "Verification tasks",
    "------------------",
    "check - Runs all checks.",
    "test",
    "",
    "Rules",
    "-----",
    "Pattern: clean<TaskName>: Cleans the output files of a task.",
    "",
    "To see all tasks and more detail, run gradlew tasks --all",
    "",
    "BUILD SUCCESSFUL in 1s",
  ].join("\n");

  it("groups tasks under their section header", () => {
    expect(parseTasksOutput(output, ":")).toEqual([
      {
        name: "assemble",
        project: ":",
        description: "Assembles the outputs of this project.",
        group: "Build",
      },
      { name: "build", project: ":", description: "Assembles and tests this project.", group: "Build" },
      { name: "check", project: ":", description: "Runs all checks.", group: "Verification" },
      { name: "test", project: ":", description: "", group: "Verification" },
    ]);
  });

  it("records the requested project on every task", () => {
    const tasks = parseTasksOutput("Build tasks\n-----------\njar - Assembles a jar archive.\n", ":app");
    expect(tasks).toEqual([
      { name: "jar", project: ":app", description: "Assembles a jar archive.", group: "Build" },
    ]);
  });

  it("accepts qualified task names", () => {
    const tasks = parseTasksOutput("Other tasks\n-----------\napp:compileJava - Compiles main.\n", ":");
    expect(tasks[0]?.name).toBe("app:compileJava");
  });

  it("ignores lines before the first group", () => {
    expect(parseTasksOutput("stray - line\n", ":")).toEqual([]);
  });
});
