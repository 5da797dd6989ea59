import { execFile } from "child_process";
import { promisify } from "util";
import { ExternalToolFailure } from "./errors";

const execFilePromise = promisify(execFile);

export type CommandRunner = (command: string) => Promise<void>;

/**
 * Quote a value for safe inclusion in a bash command line.
 *
 * @param value
 */
export function shellQuote(value: string): string {
  if (/^[a-zA-Z0-9_./:=@%+,-]+$/.test(value)) return value;

  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Join a set of argument lists into a single piped bash command.
 *
 * @param commands each entry is the argv of one stage of the pipe
 */
export function pipeCommands(...commands: string[][]): string {
  return commands.map((argv) => argv.map(shellQuote).join(" ")).join(" | ");
}

function failureDetails(e: unknown): { exitCode: number | null; stderr: string } {
  if (!(e instanceof Error)) return { exitCode: null, stderr: String(e) };

  const exitCode = "code" in e && typeof e.code === "number" ? e.code : null;
  const stderr =
    "stderr" in e && typeof e.stderr === "string" && e.stderr
      ? e.stderr
      : e.message;

  return { exitCode, stderr };
}

/**
 * Run a command line through bash (with pipefail set, so a failure anywhere in a
 * pipe fails the whole). Output is echoed to our logs - and any non-zero exit
 * becomes an ExternalToolFailure carrying the captured stderr.
 *
 * @param command the full bash command line
 */
export async function runBashCommand(command: string): Promise<void> {
  console.log(`Running bash command:\n${command}`);

  console.time(command);

  try {
    const { stdout, stderr } = await execFilePromise(
      "bash",
      ["-o", "pipefail", "-c", command],
      {
        maxBuffer: 1024 * 1024 * 64,
      }
    );

    if (stdout) {
      stdout.split("\n").forEach((l) => console.log(`stdout ${l}`));
    }
    if (stderr) {
      stderr.split("\n").forEach((l) => console.log(`stderr ${l}`));
    }
  } catch (e) {
    const { exitCode, stderr } = failureDetails(e);

    throw new ExternalToolFailure(command, exitCode, stderr);
  } finally {
    console.timeEnd(command);
  }
}
