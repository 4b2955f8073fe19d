import type { Volume, VolumeEnumerator } from "@/services/VolumeResolver";

export class VolumeEnumeratorFake implements VolumeEnumerator {
  volumes: Volume[];
  failure: Error | undefined;

  constructor(volumes: Volume[] = []) {
    this.volumes = volumes;
  }

  async list(): Promise<Volume[]> {
    if (this.failure) throw this.failure;
    return this.volumes.map((v) => ({ ...v }));
  }
}
