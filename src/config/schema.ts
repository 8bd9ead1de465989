/**
 * bokeh-resources configuration schema.
 *
 * Stored as a single YAML file; every field has a default so an empty or
 * missing file means "CDN, packaged assets, built-in version".
 */

import { z } from "zod";
import { BOKEH_VERSION } from "../version.js";

export const ResourcesConfig = z.object({
  schemaVersion: z.literal(1).default(1),
  /** Deployment mode selector (cdn, inline-dev, relative, ...). */
  mode: z.string().min(1).default("cdn"),
  /** Directories searched in order for `js/` and `css/`. Empty means the packaged assets. */
  resourceRoots: z.array(z.string().min(1)).default([]),
  /** Release directory for remote modes, replacing the public CDN. */
  cdnUrl: z.string().url().optional(),
  /** BokehJS version named in remote file names. */
  version: z.string().min(1).default(BOKEH_VERSION),
  /** Directory for JSONL resolution events. Unset disables event logging. */
  eventLogDir: z.string().min(1).optional(),
});
export type ResourcesConfig = z.infer<typeof ResourcesConfig>;

export const CONFIG_FILE_NAME = "bokeh-resources.yaml";

/** Environment variable overriding `mode`. */
export const MODE_ENV_VAR = "BOKEH_RESOURCES";
