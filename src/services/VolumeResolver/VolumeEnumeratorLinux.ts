import { type Static, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import path from "node:path";

import { type CommandRunner, runCommand } from "@/utils/command";

import type { Volume, VolumeEnumerator } from "./Volume";

const blockDeviceSchema = t.Recursive((self) =>
  t.Object({
    mountpoint: t.Optional(t.Union([t.String(), t.Null()])),
    label: t.Optional(t.Union([t.String(), t.Null()])),
    children: t.Optional(t.Array(self)),
  })
);

type BlockDevice = Static<typeof blockDeviceSchema>;

const lsblkOutputSchema = t.Object({
  blockdevices: t.Array(blockDeviceSchema),
});

function collectVolumes(devices: BlockDevice[], volumes: Volume[]) {
  for (const device of devices) {
    const mountPath = device.mountpoint;
    // 排除未掛載與 [SWAP] 之類的虛擬掛載點
    if (mountPath && mountPath.startsWith("/")) {
      volumes.push({
        mountPath,
        label: device.label || `Drive_${path.posix.basename(mountPath) || "root"}`,
      });
    }
    if (device.children) collectVolumes(device.children, volumes);
  }
  return volumes;
}

/**
 * 解析 `lsblk --json --output MOUNTPOINT,LABEL` 的輸出，
 * 包含分割區（children）中的掛載點。
 */
export function parseLsblkVolumes(stdout: string): Volume[] {
  const raw: unknown = JSON.parse(stdout);
  if (!Value.Check(lsblkOutputSchema, raw)) {
    throw new Error("無法解析 lsblk 輸出");
  }
  return collectVolumes(raw.blockdevices, []);
}

export class VolumeEnumeratorLinux implements VolumeEnumerator {
  private readonly run: CommandRunner;

  constructor(run: CommandRunner = runCommand) {
    this.run = run;
  }

  async list(): Promise<Volume[]> {
    const stdout = await this.run("lsblk", [
      "--json",
      "--output",
      "MOUNTPOINT,LABEL",
    ]);
    return parseLsblkVolumes(stdout);
  }
}
