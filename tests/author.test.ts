import { describe, it, expect } from "vitest";
import { AuthorJob, AuthorTask, RemoteCommand } from "../src/execution/tractor/author.js";
import { tclList, tclWord } from "../src/execution/tractor/tcl.js";

describe("tcl quoting", () => {
  it("brace-quotes words whose braces balance", () => {
    expect(tclWord("plain")).toBe("{plain}");
    expect(tclWord("a {b} c")).toBe("{a {b} c}");
    expect(tclWord("$HOME")).toBe("{$HOME}");
  });

  it("escapes words that cannot be brace-quoted", () => {
    expect(tclWord("a}b")).toBe('"a\\}b"');
    expect(tclWord("C:\\x $y")).toBe('"C:\\\\x \\$y"');
  });

  it("quotes every list element", () => {
    expect(tclList(["meshroom_compute", "--node", "A"])).toBe("{{meshroom_compute} {--node} {A}}");
  });
});

describe("author objects", () => {
  it("writes a remote command with its options", () => {
    const cmd = new RemoteCommand({
      argv: ["x"],
      service: "s",
      tags: ["arnold", "houdinie"],
      envkey: ["setenv A=1"],
      expand: true
    });
    expect(cmd.asTcl()).toBe("RemoteCmd {{x}} -service {s} -tags {arnold houdinie} -envkey {{setenv A=1}} -expand 1");
  });

  it("refuses a command without argv", () => {
    expect(() => new RemoteCommand({ argv: [] })).toThrow("RemoteCmd argv must be non-empty");
  });

  it("writes a job tree and references shared tasks as instances", () => {
    const job = new AuthorJob({ title: "demo", service: "mikrosRender", projects: ["vfx"], spoolcwd: "/tmp", priority: 4000 });
    const root = job.newTask({ title: "demo", serialsubtasks: true });
    const a = root.newTask({ title: "A", argv: ["echo", "a"], service: "svc" });
    const b = new AuthorTask({ title: "B", argv: ["echo", "b"] });
    a.addChild(b);
    root.addChild(b);

    expect(job.asTcl()).toBe(
      [
        "##AlfredToDo 3.0",
        "",
        "Job -title {demo} -priority 4000 -service {mikrosRender} -projects {{vfx}} -spoolcwd {/tmp} -subtasks {",
        "    Task -title {demo} -serialsubtasks 1 -subtasks {",
        "        Task -title {A} -service {svc} -subtasks {",
        "            Task -title {B} -cmds {",
        "                RemoteCmd {{echo} {b}}",
        "            }",
        "        } -cmds {",
        "            RemoteCmd {{echo} {a}} -service {svc}",
        "        }",
        "        Instance -title {B}",
        "    }",
        "}",
        ""
      ].join("\n")
    );
  });

  it("refuses to write a job without tasks", () => {
    expect(() => new AuthorJob({ title: "demo" }).asTcl()).toThrow("job demo has no tasks");
  });
});
