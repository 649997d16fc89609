import { describe, expect, it } from "vitest";
import pino from "pino";
import { ChildProcessRunner, DryRunRunner, describeCommand, resolveInvocation } from "../../src/infra/commandRunner";
import { CommandFailedError } from "../../src/models/errorCodes";

const NODE = process.execPath;

describe("resolveInvocation", () => {
  it("runs unprivileged commands directly", () => {
    expect(resolveInvocation("npm", ["install"])).toEqual({ file: "npm", argv: ["install"] });
  });

  it("prefixes privileged commands with sudo", () => {
    expect(resolveInvocation("apt", ["update"], true)).toEqual({ file: "sudo", argv: ["apt", "update"] });
    expect(describeCommand("systemctl", ["enable", "lightdm"], true)).toBe("sudo systemctl enable lightdm");
  });
});

describe("ChildProcessRunner", () => {
  const runner = new ChildProcessRunner();

  it("resolves when the command exits cleanly", async () => {
    await expect(runner.run(NODE, ["-e", "process.exit(0)"], { quiet: true })).resolves.toBeUndefined();
  });

  it("rejects with the exit code", async () => {
    const failure = runner.run(NODE, ["-e", "process.exit(3)"], { quiet: true });

    await expect(failure).rejects.toBeInstanceOf(CommandFailedError);
    await expect(failure).rejects.toMatchObject({ exitCode: 3, details: { command: NODE, args: ["-e", "process.exit(3)"], exitCode: 3 } });
  });

  it("feeds input through stdin", async () => {
    const script = "let d='';process.stdin.on('data',(c)=>{d+=c}).on('end',()=>process.exit(d==='kiosk\\n'?0:7))";

    await expect(runner.run(NODE, ["-e", script], { input: "kiosk\n", quiet: true })).resolves.toBeUndefined();
    await expect(runner.run(NODE, ["-e", script], { input: "guest\n", quiet: true })).rejects.toMatchObject({ exitCode: 7 });
  });

  it("runs in the requested directory", async () => {
    const script = "process.exit(process.cwd()==='/'?0:9)";

    await expect(runner.run(NODE, ["-e", script], { cwd: "/", quiet: true })).resolves.toBeUndefined();
  });

  it("reports commands that cannot be spawned", async () => {
    await expect(runner.run("dialtone-missing-binary", [], { quiet: true })).rejects.toMatchObject({
      code: "COMMAND_FAILED",
      exitCode: null
    });
  });

  it("looks commands up on PATH", async () => {
    await expect(runner.commandExists("sh")).resolves.toBe(true);
    await expect(runner.commandExists("dialtone-missing-binary")).resolves.toBe(false);
  });

  it("refuses command names that are not plain words", async () => {
    await expect(runner.commandExists("node; reboot")).rejects.toMatchObject({ code: "INVALID_CONFIGURATION" });
  });
});

describe("DryRunRunner", () => {
  it("logs commands instead of running them", async () => {
    const events: Array<Record<string, unknown>> = [];
    const logger = pino({ level: "info" }, {
      write(line: string) {
        events.push(JSON.parse(line));
      }
    });
    const runner = new DryRunRunner(logger);

    await runner.run("tee", ["/etc/lightdm/lightdm.conf"], { privileged: true, input: "[Seat:*]\n" });

    expect(events[0]).toMatchObject({
      msg: "dryrun.command",
      command: "sudo tee /etc/lightdm/lightdm.conf",
      stdinBytes: 9
    });
    await expect(runner.commandExists("node")).resolves.toBe(true);
  });
});
