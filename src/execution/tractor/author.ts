import { tclBool, tclList, tclWord } from "./tcl.js";

const INDENT = "    ";

export interface RemoteCommandInit {
  argv: string[];
  service?: string;
  tags?: string[];
  envkey?: string[];
  expand?: boolean;
}

export class RemoteCommand {
  readonly argv: string[];
  service: string;
  tags: string[];
  envkey: string[];
  expand: boolean;

  constructor(init: RemoteCommandInit) {
    if (init.argv.length === 0) throw new Error("RemoteCmd argv must be non-empty");
    this.argv = [...init.argv];
    this.service = init.service ?? "";
    this.tags = [...(init.tags ?? [])];
    this.envkey = [...(init.envkey ?? [])];
    this.expand = init.expand ?? false;
  }

  asTcl(indent = ""): string {
    const parts = [`RemoteCmd ${tclList(this.argv)}`];
    if (this.service) parts.push(`-service ${tclWord(this.service)}`);
    if (this.tags.length > 0) parts.push(`-tags ${tclWord(this.tags.join(" "))}`);
    if (this.envkey.length > 0) parts.push(`-envkey ${tclList(this.envkey)}`);
    if (this.expand) parts.push(`-expand ${tclBool(true)}`);
    return indent + parts.join(" ");
  }
}

export interface AuthorTaskInit {
  title: string;
  argv?: string[] | null;
  service?: string;
  metadata?: string;
  serialsubtasks?: boolean;
}

export class AuthorTask {
  readonly title: string;
  readonly service: string;
  readonly metadata: string;
  readonly serialsubtasks: boolean;
  readonly subtasks: AuthorTask[] = [];
  readonly cmds: RemoteCommand[] = [];

  constructor(init: AuthorTaskInit) {
    this.title = init.title;
    this.service = init.service ?? "";
    this.metadata = init.metadata ?? "";
    this.serialsubtasks = init.serialsubtasks ?? false;
    if (init.argv && init.argv.length > 0) {
      this.cmds.push(new RemoteCommand({ argv: init.argv, service: this.service }));
    }
  }

  /** Children run before their parent. The same task may be added under several parents. */
  addChild(task: AuthorTask): void {
    this.subtasks.push(task);
  }

  newTask(init: AuthorTaskInit): AuthorTask {
    const task = new AuthorTask(init);
    this.addChild(task);
    return task;
  }

  addCommand(init: RemoteCommandInit): RemoteCommand {
    const cmd = new RemoteCommand(init);
    this.cmds.push(cmd);
    return cmd;
  }

  /**
   * Emits the task tree. A task already written elsewhere in the script is
   * referenced with an Instance line instead of being duplicated.
   */
  tclLines(indent: string, emitted: Set<AuthorTask>): string[] {
    if (emitted.has(this)) return [`${indent}Instance -title ${tclWord(this.title)}`];
    emitted.add(this);

    const head = [`Task -title ${tclWord(this.title)}`];
    if (this.service) head.push(`-service ${tclWord(this.service)}`);
    if (this.metadata) head.push(`-metadata ${tclWord(this.metadata)}`);
    if (this.serialsubtasks) head.push(`-serialsubtasks ${tclBool(true)}`);

    const out: string[] = [];
    let line = indent + head.join(" ");
    if (this.subtasks.length > 0) {
      out.push(`${line} -subtasks {`);
      for (const sub of this.subtasks) out.push(...sub.tclLines(indent + INDENT, emitted));
      line = `${indent}}`;
    }
    if (this.cmds.length > 0) {
      out.push(`${line} -cmds {`);
      for (const cmd of this.cmds) out.push(cmd.asTcl(indent + INDENT));
      line = `${indent}}`;
    }
    out.push(line);
    return out;
  }

  asTcl(): string {
    return this.tclLines("", new Set()).join("\n") + "\n";
  }
}

export interface AuthorJobInit {
  title: string;
  service?: string;
  metadata?: string;
  envkey?: string[];
  paused?: boolean;
  comment?: string;
  spoolcwd?: string;
  projects?: string[];
  priority?: number;
}

export class AuthorJob {
  readonly title: string;
  readonly service: string;
  readonly metadata: string;
  readonly envkey: string[];
  readonly paused: boolean;
  readonly comment: string;
  readonly spoolcwd: string;
  readonly projects: string[];
  priority: number;
  readonly subtasks: AuthorTask[] = [];

  constructor(init: AuthorJobInit) {
    this.title = init.title;
    this.service = init.service ?? "";
    this.metadata = init.metadata ?? "";
    this.envkey = [...(init.envkey ?? [])];
    this.paused = init.paused ?? false;
    this.comment = init.comment ?? "";
    this.spoolcwd = init.spoolcwd ?? "";
    this.projects = [...(init.projects ?? [])];
    this.priority = init.priority ?? 5000;
  }

  addChild(task: AuthorTask): void {
    this.subtasks.push(task);
  }

  newTask(init: AuthorTaskInit): AuthorTask {
    const task = new AuthorTask(init);
    this.addChild(task);
    return task;
  }

  asTcl(): string {
    if (this.subtasks.length === 0) throw new Error(`job ${this.title} has no tasks`);

    const head = [`Job -title ${tclWord(this.title)}`, `-priority ${this.priority}`];
    if (this.service) head.push(`-service ${tclWord(this.service)}`);
    if (this.envkey.length > 0) head.push(`-envkey ${tclList(this.envkey)}`);
    if (this.metadata) head.push(`-metadata ${tclWord(this.metadata)}`);
    if (this.comment) head.push(`-comment ${tclWord(this.comment)}`);
    if (this.projects.length > 0) head.push(`-projects ${tclList(this.projects)}`);
    if (this.spoolcwd) head.push(`-spoolcwd ${tclWord(this.spoolcwd)}`);
    if (this.paused) head.push(`-paused ${tclBool(true)}`);

    const emitted = new Set<AuthorTask>();
    const lines = ["##AlfredToDo 3.0", "", `${head.join(" ")} -subtasks {`];
    for (const task of this.subtasks) lines.push(...task.tclLines(INDENT, emitted));
    lines.push("}");
    return lines.join("\n") + "\n";
  }
}
