import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

export const getAppEnv = buildConfigFactoryEnv(
  t.Object({
    RAW_INGEST_CONFIG_PATH: t.String({ default: "raw_ingest_config.json" }),
    RAW_INGEST_REPORT_DIR: t.String({ default: "dist/reports" }),
  })
);
