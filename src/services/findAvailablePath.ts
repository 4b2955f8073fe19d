import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { maxCollisionAttempts } from "@/constants";
import { exists } from "@/utils/helper";

export type CollisionError = {
  type: "TOO_MANY_DUPLICATES";
  message: string;
};

/**
 * 找出資料夾中可用的檔名。已存在時在主檔名後加上 `_1`、`_2`…，
 * 例：DSCF0001.RAF → DSCF0001_1.RAF。
 */
export async function findAvailablePath(
  dir: string,
  fileName: string,
  isTaken: (p: string) => Promise<boolean> = exists
): Promise<Result<string, CollisionError>> {
  const first = path.join(dir, fileName);
  if (!(await isTaken(first))) return ok(first);

  const ext = path.extname(fileName);
  const base = path.basename(fileName, ext);
  for (let n = 1; n <= maxCollisionAttempts; n++) {
    const candidate = path.join(dir, `${base}_${n}${ext}`);
    if (!(await isTaken(candidate))) return ok(candidate);
  }
  return err({ type: "TOO_MANY_DUPLICATES", message: "重複檔名過多" });
}
