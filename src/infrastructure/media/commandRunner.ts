import { spawn } from "node:child_process";
import { ExternalToolError } from "../../domain/errors";

export type CommandResult = {
  code: number | null;
  stdout: string;
  stderr: string;
};

export type CommandRunner = (command: string, args: string[], options?: { signal?: AbortSignal }) => Promise<CommandResult>;

/** Runs a tool to completion. Non-zero exits resolve; only a failed spawn rejects. */
export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    let stdout = "";
    const stderr = createTailBuffer(8192);
    const proc = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"], signal: options.signal });
    proc.stdout.on("data", (data: Buffer) => (stdout += data.toString()));
    proc.stderr.on("data", (data: Buffer) => stderr.append(data));
    proc.on("error", (error) => {
      if (options.signal?.aborted) {
        reject(error);
        return;
      }
      reject(new ExternalToolError(command, null, `${command} not found or failed to start: ${error.message}`));
    });
    proc.on("close", (code) => resolve({ code, stdout, stderr: stderr.value() }));
  });

export function summarizeOutput(output: string) {
  return output.trim().replaceAll(/\s+/g, " ");
}

function createTailBuffer(limit: number) {
  let buffer = Buffer.alloc(0);
  return {
    append(chunk: Buffer) {
      buffer = Buffer.concat([buffer, chunk]);
      if (buffer.length > limit) {
        buffer = buffer.subarray(buffer.length - limit);
      }
    },
    value() {
      return buffer.toString("utf-8").trim();
    }
  };
}
