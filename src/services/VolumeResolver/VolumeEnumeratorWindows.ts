import { Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { type CommandRunner, runCommand } from "@/utils/command";

import type { Volume, VolumeEnumerator } from "./Volume";

const logicalDiskSchema = t.Object({
  DeviceID: t.String(),
  VolumeName: t.Union([t.String(), t.Null()]),
  Size: t.Optional(t.Union([t.Number(), t.Null()])),
});

const logicalDiskOutputSchema = t.Union([
  logicalDiskSchema,
  t.Array(logicalDiskSchema),
]);

const listCommand = [
  "-NoProfile",
  "-NonInteractive",
  "-Command",
  "Get-CimInstance Win32_LogicalDisk | Select-Object DeviceID,VolumeName,Size | ConvertTo-Json -Compress",
];

/**
 * 解析 PowerShell `Win32_LogicalDisk` 的 JSON 輸出。
 * - 只有一顆磁碟時輸出是物件而非陣列
 * - Size 為 null 代表沒有媒體（例如空的讀卡機），略過
 * - 沒有標籤的磁碟命名為 `Drive_<代號>`
 */
export function parseWindowsVolumes(stdout: string): Volume[] {
  const text = stdout.trim();
  if (text === "") return [];

  const raw: unknown = JSON.parse(text);
  if (!Value.Check(logicalDiskOutputSchema, raw)) {
    throw new Error("無法解析 Win32_LogicalDisk 輸出");
  }
  const disks = Array.isArray(raw) ? raw : [raw];

  return disks
    .filter((disk) => disk.Size !== null)
    .map((disk) => {
      const letter = disk.DeviceID.replace(/:$/, "");
      return {
        mountPath: `${disk.DeviceID}\\`,
        label: disk.VolumeName || `Drive_${letter}`,
      };
    });
}

export class VolumeEnumeratorWindows implements VolumeEnumerator {
  private readonly run: CommandRunner;

  constructor(run: CommandRunner = runCommand) {
    this.run = run;
  }

  async list(): Promise<Volume[]> {
    const stdout = await this.run("powershell.exe", listCommand);
    return parseWindowsVolumes(stdout);
  }
}
