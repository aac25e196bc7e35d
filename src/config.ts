import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv, envNumber } from "~shared/ConfigFactory";

export const getAppConfig = buildConfigFactoryEnv(
  t.Object({
    NETRC_PATH: t.String({ default: "~/.netrc" }),
    ICEBRIDGE_ARCHIVE_URL: t.String({
      default: "https://n5eil01u.ecs.nsidc.org",
    }),
    EARTHDATA_HOST: t.String({ default: "urs.earthdata.nasa.gov" }),
    SPECIAL_CASES_PATH: t.Optional(t.String()),
    DUMP_DIR: t.String({ default: "dist/reports" }),
    HTTP_TIMEOUT_MS: envNumber({ default: 120_000, minimum: 1 }),
    DOWNLOAD_CONCURRENCY: envNumber({ default: 4, minimum: 1 }),
  })
);

export type AppConfig = ReturnType<typeof getAppConfig>;
