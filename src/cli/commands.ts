/**
 * CLI command implementations.
 *
 * Every function:
 *   - accepts parsed arguments
 *   - calls library functions (no business logic here)
 *   - writes to stdout / stderr
 *   - returns an exit code (0 = success, 1 = usage or configuration error)
 *
 * Run failures (a session, the workbook, the upload) propagate to the entry
 * point, which exits with 2.
 */

import { join } from "node:path";
import {
  CorpusCodeListSchema,
  DemographicsDocumentSchema,
  PhotoPromptsDocumentSchema,
  ScriptCategoriesDocumentSchema,
  StatSchemaDocumentSchema,
  SubstitutionsDocumentSchema,
  loadDocument,
} from "../config/documents.js";
import {
  COUNTRY_FORMATS,
  createRunConfig,
  type CountryFormat,
  type RunConfig,
  type RunConfigInput,
} from "../config/run-config.js";
import { stderrDiagnostics, type Diagnostics } from "../diagnostics.js";
import { ReportError } from "../errors.js";
import {
  EXIF_HEADERS,
  buildExifTagMap,
  createHttpGeolocationClient,
  md5File,
  type GeolocationClient,
  type PhotoDecoder,
} from "../evidence/index.js";
import {
  RecordStore,
  type ProjectRecord,
  type RecordStoreGateway,
  type RecordStoreOptions,
} from "../records/index.js";
import {
  buildReportSchema,
  loadReportCache,
  runReport,
  writeReportWorkbook,
  type CacheEntry,
  type ReportSchema,
} from "../report/index.js";
import {
  createRcloneUploader,
  uploadDestination,
  uploadReport,
  type Uploader,
} from "../upload/rclone.js";
import { parseWorkers, type CliConfig } from "./config.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function err(msg: string): void {
  process.stderr.write(`error: ${msg}\n`);
}

function out(msg: string): void {
  process.stdout.write(msg + "\n");
}

function listFlag(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s !== "");
}

function isCountryFormat(value: string): value is CountryFormat {
  return COUNTRY_FORMATS.some((format) => format === value);
}

/** A store that can be closed once the command is done with it. */
export type ClosableStore = RecordStoreGateway & { close(): void };

/** Collaborators the report command talks to; tests replace them. */
export interface ReportCommandDeps {
  openStore: (dbPath: string, options: RecordStoreOptions) => ClosableStore;
  geolocation: (endpoint: string) => GeolocationClient;
  photos: () => Promise<PhotoDecoder>;
  uploader: Uploader;
  diagnostics: Diagnostics;
  now: () => Date;
}

export const defaultReportDeps: ReportCommandDeps = {
  openStore: (dbPath, options) => new RecordStore(dbPath, options),
  geolocation: (endpoint) => createHttpGeolocationClient({ endpoint }),
  // loaded on demand: the decoder pulls in the native image stack
  photos: async () => (await import("../evidence/photo-decoder.js")).createPhotoDecoder(),
  uploader: createRcloneUploader(),
  diagnostics: stderrDiagnostics,
  now: () => new Date(),
};

// ---------------------------------------------------------------------------
// config show
// ---------------------------------------------------------------------------

export function cmdConfigShow(config: CliConfig, json: boolean): number {
  if (json) {
    out(JSON.stringify(config, null, 2));
  } else {
    out(`dbPath:          ${config.dbPath}`);
    out(`uploadRemote:    ${config.uploadRemote}`);
    out(`uploadDir:       ${config.uploadDir}`);
    out(`geoEndpoint:     ${config.geoEndpoint}`);
    out(
      `statPathRewrite: ${
        config.statPathRewrite
          ? `${config.statPathRewrite.from} -> ${config.statPathRewrite.to}`
          : "(none)"
      }`,
    );
    out(`workers:         ${config.workers}`);
  }
  return 0;
}

// ---------------------------------------------------------------------------
// report
// ---------------------------------------------------------------------------

/** Build the run configuration from flags; throws CONFIG_INVALID. */
export function runConfigFromFlags(
  flags: Map<string, string>,
  boolFlags: Set<string>,
  config: CliConfig,
  diagnostics: Diagnostics,
): RunConfig {
  const input: RunConfigInput = {
    medianStats: boolFlags.has("median-stats"),
    bluetooth: boolFlags.has("bluetooth"),
    inputs: boolFlags.has("inputs"),
    fromScratch: boolFlags.has("from-scratch"),
    workers: flags.has("workers")
      ? parseWorkers(flags.get("workers"), "--workers")
      : config.workers,
  };

  const schemaPath = flags.get("schema");
  if (schemaPath) input.statSchema = loadDocument(schemaPath, StatSchemaDocumentSchema);

  const demographicsPath = flags.get("demographics");
  if (demographicsPath) {
    input.demographics = loadDocument(demographicsPath, DemographicsDocumentSchema);
  }

  const categoriesPath = flags.get("script-categories");
  if (categoriesPath) {
    input.scriptCategories = loadDocument(categoriesPath, ScriptCategoriesDocumentSchema, {
      mapAsMap: true,
    });
  }

  const substitutionsPath = flags.get("substitutions");
  if (substitutionsPath) {
    input.substitutions = loadDocument(substitutionsPath, SubstitutionsDocumentSchema);
  }

  const excludePath = flags.get("exclude-corpus-codes");
  if (excludePath) {
    input.excludeCorpusCodes = loadDocument(excludePath, CorpusCodeListSchema);
  }

  const photoPromptsPath = flags.get("photo-prompts");
  if (photoPromptsPath) {
    input.photoPrompts = loadDocument(photoPromptsPath, PhotoPromptsDocumentSchema);
  }

  const countries = flags.get("countries");
  if (countries !== undefined) {
    if (!isCountryFormat(countries)) {
      throw new ReportError(
        `--countries must be one of ${COUNTRY_FORMATS.join(", ")}`,
        "CONFIG_INVALID",
        { value: countries },
      );
    }
    input.countryFormat = countries;
  }

  const promptAttributes = listFlag(flags.get("prompt-attributes"));
  if (promptAttributes) input.promptAttributes = promptAttributes;

  const languageColumns = listFlag(flags.get("language-columns"));
  if (languageColumns) input.languageColumns = languageColumns;

  return createRunConfig(input, diagnostics);
}

/** `<number>_<name>_<description>_<langCode>_collection_report.xlsx` */
export function reportFileName(
  project: ProjectRecord,
  override: string | undefined,
): string {
  if (override !== undefined) {
    return override.endsWith(".xlsx") ? override : `${override}.xlsx`;
  }
  return `${project.number}_${project.name}_${project.description}_${project.langCode}_collection_report.xlsx`;
}

interface SchemaPlan {
  schema: ReportSchema;
  inputCorpusCodes: Set<string>;
}

function planSchema(
  store: RecordStoreGateway,
  project: ProjectRecord,
  runConfig: RunConfig,
  diagnostics: Diagnostics,
): SchemaPlan {
  const inputCorpusCodes = new Set<string>();
  const inputNames: string[] = [];
  if (runConfig.inputs) {
    const definitions = store.listInputPrompts(project.id);
    if (definitions.length === 0) {
      diagnostics.warn("--inputs was given, but the project has no input prompts");
    }
    for (const definition of definitions) {
      inputCorpusCodes.add(definition.corpusCode);
      for (const input of definition.inputs) inputNames.push(input.name);
    }
  }

  const hasUnmappedPhotoCodes = store
    .listImageCorpusCodes(project.id)
    .some((code) => !Object.hasOwn(runConfig.photoPrompts, code));

  return {
    schema: buildReportSchema(runConfig, { inputNames, hasUnmappedPhotoCodes }),
    inputCorpusCodes,
  };
}

export async function cmdReport(
  positional: string[],
  flags: Map<string, string>,
  boolFlags: Set<string>,
  config: CliConfig,
  json: boolean,
  deps: ReportCommandDeps = defaultReportDeps,
): Promise<number> {
  const projectArg = positional[1];
  const projectId = Number(projectArg);
  if (!projectArg || !Number.isInteger(projectId) || projectId < 0) {
    err("Usage: collection-report report <projectId> [options]");
    return 1;
  }

  const { diagnostics } = deps;
  let runConfig: RunConfig;
  try {
    runConfig = runConfigFromFlags(flags, boolFlags, config, diagnostics);
  } catch (e: unknown) {
    if (e instanceof ReportError && e.code === "CONFIG_INVALID") {
      err(e.message);
      return 1;
    }
    throw e;
  }
  const exifTags = buildExifTagMap(EXIF_HEADERS);

  const store = deps.openStore(config.dbPath, {
    readonly: true,
    statPathRewrite: config.statPathRewrite,
  });
  try {
    const project = store.getProject(projectId);
    if (!project) {
      err(`Project not found: ${projectId}`);
      return 1;
    }

    const { schema, inputCorpusCodes } = planSchema(
      store,
      project,
      runConfig,
      diagnostics,
    );
    const reportPath = join(
      project.docsPath,
      "TempReport",
      reportFileName(project, flags.get("report-name")),
    );
    const cache: Map<string, CacheEntry> = runConfig.fromScratch
      ? new Map()
      : await loadReportCache(reportPath, schema, diagnostics);

    const run = await runReport(project, {
      config: runConfig,
      schema,
      store,
      geolocation: deps.geolocation(config.geoEndpoint),
      photos: await deps.photos(),
      checksum: md5File,
      diagnostics,
      now: deps.now,
      exifTags,
      inputCorpusCodes,
      cache,
    });

    await writeReportWorkbook(reportPath, run.tables);

    let destination: string | null = null;
    if (!boolFlags.has("no-upload")) {
      destination = uploadDestination(config.uploadRemote, config.uploadDir, project);
      await uploadReport(deps.uploader, reportPath, destination);
    }

    if (json) {
      out(
        JSON.stringify(
          { projectId, reportPath, uploadedTo: destination, ...run.summary },
          null,
          2,
        ),
      );
    } else {
      out(`Report written: ${reportPath}`);
      out(`  Sessions:    ${run.summary.sessions}`);
      out(`  Cache hits:  ${run.summary.cacheHits}`);
      out(`  Recomputed:  ${run.summary.recomputed}`);
      out(`  Stat rows:   ${run.summary.statRows}`);
      if (destination) out(`  Uploaded to: ${destination}`);
    }
    return 0;
  } finally {
    store.close();
  }
}
