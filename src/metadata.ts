import { z } from 'zod';
import { formatZodIssues } from './config.js';
import { DataFetchError } from './errors.js';

const platformMeasurementSchema = z.object({
  platform: z.string().min(1),
  perf_data: z.string().min(1),
  aggr_json_profiles: z.string().min(1),
});

export const metadataSchema = z.object({
  name: z.string(),
  project_source: z.string(),
  command: z.string(),
  data_root: z.string(),
  binaries: z.array(z.string()),
  platforms: z.array(platformMeasurementSchema),
});

export type PlatformMeasurement = z.infer<typeof platformMeasurementSchema>;
export type BenchMetadata = z.infer<typeof metadataSchema>;

export function parseMetadata(raw: unknown, url: string): BenchMetadata {
  const parsed = metadataSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DataFetchError(url, `Malformed METADATA: ${formatZodIssues(parsed.error).join('; ')}`);
  }
  return parsed.data;
}

export interface MetadataInput {
  projectLabel: string;
  projectSource: string;
  command: string;
  dataRoot: string;
  platforms: readonly string[];
  binaries: readonly string[];
  resultFileName: string;
  profilesFileName: string;
}

/**
 * METADATA tells the report generator which platforms ran for a project on
 * a day and where each platform's CSV files live, relative to the dated root.
 */
export function buildMetadata(input: MetadataInput): BenchMetadata {
  return {
    name: input.projectLabel,
    project_source: input.projectSource,
    command: input.command,
    data_root: input.dataRoot,
    binaries: [...input.binaries],
    platforms: input.platforms.map((platform) => ({
      platform,
      perf_data: `${platform}/${input.resultFileName}`,
      aggr_json_profiles: `${platform}/${input.profilesFileName}`,
    })),
  };
}
