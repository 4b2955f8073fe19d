import type { Logger } from "~shared/Logger";

import { getAppEnv } from "@/config/env";
import { ConfigStoreJson } from "@/services/ConfigStore";
import { VolumeResolver, createVolumeEnumerator } from "@/services/VolumeResolver";
import { expandHome } from "@/utils/helper";

export type ConfigOption = {
  config?: string;
};

export function createConfigStore(logger: Logger, options: ConfigOption) {
  const filePath = expandHome(
    options.config ?? getAppEnv().RAW_INGEST_CONFIG_PATH
  );
  return new ConfigStoreJson({ filePath, logger });
}

export function createVolumeResolver(logger: Logger) {
  return new VolumeResolver({
    enumerator: createVolumeEnumerator(),
    logger,
  });
}
