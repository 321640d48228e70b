import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import chalk from 'chalk';
import { aggregateReadings } from './aggregate.js';
import { storageUrl, type StorageClient } from './client.js';
import type { BenchConfig } from './config.js';
import { formatCompactDate, formatIsoDate, type BenchDate } from './dates.js';
import { errorMessage, RenderError } from './errors.js';
import { buildGraphData } from './graph-data.js';
import { parseMetadata } from './metadata.js';
import { computePhaseProportions } from './phases.js';
import { renderReport, ReportBuilder, type ReportDocument } from './report.js';
import { parsePhaseSamples, parseRunRecords } from './results.js';
import { datedSubdir, gsUri, type GsutilStorage } from './storage.js';
import type { GraphData } from './types.js';

export interface ReportRequest {
  project: string;
  date: BenchDate;
  bucket: string;
  reportName: string;
  /** Copy the finished report to the bucket. */
  upload: boolean;
}

export interface ReportDeps {
  client: StorageClient;
  storage: GsutilStorage;
  debug?: boolean;
}

export interface ReportResult {
  project: string;
  date: string;
  platforms: string[];
  path: string;
  uploadedTo?: string;
}

export function reportFilePath(config: BenchConfig, project: string, date: BenchDate): string {
  return join(config.reportsDirectory, `report_${project}_${formatCompactDate(date)}.html`);
}

export function reportDestination(bucket: string, project: string, date: BenchDate, reportName: string): string {
  return gsUri(bucket, `${datedSubdir(project, date)}/${reportName}.html`);
}

/** Fetches a platform's two CSV files and reshapes them into chart tables. */
export async function fetchGraphData(
  client: StorageClient,
  rootUrl: string,
  perfDataPath: string,
  profilesPath: string,
  phases: readonly string[]
): Promise<GraphData> {
  const perfUrl = `${rootUrl}/${perfDataPath}`;
  const profilesUrl = `${rootUrl}/${profilesPath}`;
  const runs = parseRunRecords(await client.getText(perfUrl), perfUrl);
  const samples = parsePhaseSamples(await client.getText(profilesUrl), profilesUrl);
  return buildGraphData(aggregateReadings(runs), computePhaseProportions(samples), phases);
}

export async function buildReport(
  request: Pick<ReportRequest, 'project' | 'date' | 'bucket'>,
  config: BenchConfig,
  client: StorageClient
): Promise<ReportDocument> {
  const rootUrl = storageUrl(config.storageHost, request.bucket, datedSubdir(request.project, request.date));
  const metadataUrl = `${rootUrl}/METADATA`;
  const metadata = parseMetadata(await client.getJson(metadataUrl), metadataUrl);

  const builder = new ReportBuilder(request.project, formatIsoDate(request.date));
  for (const measurement of metadata.platforms) {
    const data = await fetchGraphData(
      client,
      rootUrl,
      measurement.perf_data,
      measurement.aggr_json_profiles,
      config.phases
    );
    builder.addPlatform(measurement.platform, data);
  }
  return builder.build();
}

/**
 * Generates the HTML report for one project and day. Nothing is written
 * unless every platform's data was fetched and reshaped.
 */
export async function generateReportForDate(
  request: ReportRequest,
  config: BenchConfig,
  deps: ReportDeps
): Promise<ReportResult> {
  const report = await buildReport(request, config, deps.client);
  const content = renderReport(report);

  const path = reportFilePath(config, request.project, request.date);
  try {
    await mkdir(config.reportsDirectory, { recursive: true });
    await writeFile(path, content, 'utf-8');
  } catch (err) {
    throw new RenderError(path, errorMessage(err));
  }
  if (deps.debug) {
    console.error(chalk.dim(`  wrote ${path}`));
  }

  const result: ReportResult = {
    project: request.project,
    date: report.date,
    platforms: report.sections.map((section) => section.platform),
    path,
  };

  if (request.upload && request.bucket) {
    const destination = reportDestination(request.bucket, request.project, request.date, request.reportName);
    await deps.storage.copy(path, destination);
    result.uploadedTo = destination;
  }
  return result;
}
