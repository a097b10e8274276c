import { Command, CommanderError, InvalidArgumentError } from "commander";
import { UsageError } from "./errors";
import { buildExclusions } from "./policy";
import { CategoryName, CategorySelector, CliOptions, ExecutionMode, RunPlan } from "./types";

export interface ParsedArgs {
  options: CliOptions;
  plan: RunPlan;
}

type RawOptions = {
  excludeContainers: string[];
  excludeImages: string[];
  excludeVolumes: string[];
  excludeBuilders: string[];
  excludeMinikube: string[];
  excludeKind: string[];
  protectCurrentDir?: boolean;
  resetDockerDesktop?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  olderThan?: number;
  onlyContainers?: boolean;
  onlyImages?: boolean;
  onlyVolumes?: boolean;
  onlyBuilders?: boolean;
  onlyMinikube?: boolean;
  onlyKind?: boolean;
  onlyDangling?: boolean;
  onlyLogs?: boolean;
  confirm?: boolean;
  cleanLogs?: boolean;
  quiet?: boolean;
  color?: boolean;
};

export function splitList(value: string): string[] {
  return value.split(/\s+/).filter(Boolean);
}

function collectList(value: string, previous: string[]): string[] {
  return [...previous, ...splitList(value)];
}

export function parseDays(value: string): number {
  const trimmed = value.trim();
  if (!/^[0-9]+$/.test(trimmed)) {
    throw new InvalidArgumentError("Expected a whole number of days.");
  }
  return Number(trimmed);
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("devsweep")
    .description("Clean Docker and local Kubernetes resources")
    .option("--exclude-containers <list>", "Space-separated container IDs or names to exclude", collectList, [])
    .option("--exclude-images <list>", "Space-separated image IDs or repo:tags to exclude", collectList, [])
    .option("--exclude-volumes <list>", "Space-separated volume names to exclude", collectList, [])
    .option("--exclude-builders <list>", "Space-separated builder names to exclude", collectList, [])
    .option("--exclude-minikube <list>", "Space-separated minikube profiles to exclude", collectList, [])
    .option("--exclude-kind <list>", "Space-separated kind clusters to exclude", collectList, [])
    .option("--protect-current-dir", "Protect resources of the compose project in the current directory")
    .option("--reset-docker-desktop", "Reset Docker Desktop data (WARNING: removes all Docker data)")
    .option("--dry-run", "Simulate cleanup without deleting")
    .option("--verbose", "Log detailed actions")
    .option("--older-than <days>", "Only remove resources older than DAYS days", parseDays)
    .option("--only-containers", "Only clean containers")
    .option("--only-images", "Only clean images")
    .option("--only-volumes", "Only clean volumes")
    .option("--only-builders", "Only clean builders and build history")
    .option("--only-minikube", "Only clean minikube profiles")
    .option("--only-kind", "Only clean kind clusters")
    .option("--only-dangling", "Only clean dangling/unused resources")
    .option("--only-logs", "Only clean container logs")
    .option("--confirm", "Prompt for confirmation before each category")
    .option("--clean-logs", "Clean (truncate) Docker container logs")
    .option("--quiet", "Suppress output (for cron jobs)")
    .option("--no-color", "Disable colored output")
    .version("0.1.0")
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      // Usage errors are reported by the caller so --quiet can silence them.
      writeErr: () => undefined,
      outputError: () => undefined
    });

  return program;
}

const ONLY_FLAGS: Array<[keyof RawOptions, CategoryName]> = [
  ["onlyContainers", "containers"],
  ["onlyImages", "images"],
  ["onlyVolumes", "volumes"],
  ["onlyBuilders", "builders"],
  ["onlyMinikube", "minikube"],
  ["onlyKind", "kind"],
  ["onlyDangling", "dangling"],
  ["onlyLogs", "logs"]
];

/** Any --only-* flag narrows the run to exactly the named categories. */
export function resolveSelector(raw: RawOptions): CategorySelector {
  const only = new Set(ONLY_FLAGS.filter(([flag]) => raw[flag] === true).map(([, category]) => category));
  return only.size > 0 ? { all: false, only } : { all: true };
}

/**
 * Parses argv. Throws UsageError for anything malformed; --help and
 * --version surface as a CommanderError with exit code 0.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const program = buildProgram();
  const quiet = argv.includes("--quiet");

  try {
    program.parse(argv);
  } catch (error) {
    if (error instanceof CommanderError && error.exitCode !== 0) {
      throw new UsageError(error.message, program.helpInformation(), quiet);
    }
    throw error;
  }

  const raw = program.opts<RawOptions>();
  const options: CliOptions = {
    excludeContainers: raw.excludeContainers,
    excludeImages: raw.excludeImages,
    excludeVolumes: raw.excludeVolumes,
    excludeBuilders: raw.excludeBuilders,
    excludeMinikube: raw.excludeMinikube,
    excludeKind: raw.excludeKind,
    protectCurrentDir: Boolean(raw.protectCurrentDir),
    resetDockerDesktop: Boolean(raw.resetDockerDesktop),
    dryRun: Boolean(raw.dryRun),
    verbose: Boolean(raw.verbose),
    olderThan: raw.olderThan,
    onlyContainers: Boolean(raw.onlyContainers),
    onlyImages: Boolean(raw.onlyImages),
    onlyVolumes: Boolean(raw.onlyVolumes),
    onlyBuilders: Boolean(raw.onlyBuilders),
    onlyMinikube: Boolean(raw.onlyMinikube),
    onlyKind: Boolean(raw.onlyKind),
    onlyDangling: Boolean(raw.onlyDangling),
    onlyLogs: Boolean(raw.onlyLogs),
    confirm: Boolean(raw.confirm),
    cleanLogs: Boolean(raw.cleanLogs),
    quiet: Boolean(raw.quiet),
    noColor: raw.color === false
  };

  const mode: ExecutionMode = {
    dryRun: options.dryRun,
    verbose: options.verbose,
    quiet: options.quiet,
    confirmRequired: options.confirm
  };

  return {
    options,
    plan: {
      mode,
      selector: resolveSelector(raw),
      exclusions: buildExclusions({
        containers: options.excludeContainers,
        images: options.excludeImages,
        volumes: options.excludeVolumes,
        builders: options.excludeBuilders,
        minikube: options.excludeMinikube,
        kind: options.excludeKind
      }),
      olderThanDays: options.olderThan,
      protectCurrentDir: options.protectCurrentDir,
      resetDockerDesktop: options.resetDockerDesktop,
      cleanLogs: options.cleanLogs
    }
  };
}
