import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

/** 執行外部指令並回傳 stdout */
export type CommandRunner = (file: string, args: string[]) => Promise<string>;

export const runCommand: CommandRunner = async (file, args) => {
  const { stdout } = await execFileAsync(file, args, {
    windowsHide: true,
    maxBuffer: 4 * 1024 * 1024,
  });
  return stdout;
};
