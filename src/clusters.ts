import { execCommand, ExecResult, parseIdLines } from "./docker";
import { BackendResult, failure, success } from "./errors";

export type CommandExec = (command: string, args: string[]) => Promise<ExecResult>;

/** A local Kubernetes tool that owns a set of named clusters. */
export interface ClusterBackend {
  readonly tool: string;
  isInstalled(): Promise<boolean>;
  listClusters(): Promise<BackendResult<string[]>>;
  deleteCluster(name: string): Promise<BackendResult<void>>;
}

async function attempt<T>(
  exec: CommandExec,
  command: string,
  args: string[],
  parse: (result: ExecResult) => T
): Promise<BackendResult<T>> {
  try {
    return success(parse(await exec(command, args)));
  } catch (error) {
    return failure([command, ...args], error);
  }
}

async function commandAvailable(exec: CommandExec, command: string): Promise<boolean> {
  try {
    await exec(command, ["version"]);
    return true;
  } catch {
    return false;
  }
}

export function createMinikubeBackend(exec: CommandExec = execCommand): ClusterBackend {
  const tool = "minikube";
  return {
    tool,
    isInstalled: () => commandAvailable(exec, tool),
    listClusters: () =>
      attempt(exec, tool, ["profile", "list", "-o", "json"], ({ stdout }) => parseMinikubeProfiles(stdout)),
    deleteCluster: (name) => attempt(exec, tool, ["delete", "--profile", name], () => undefined)
  };
}

export function createKindBackend(exec: CommandExec = execCommand): ClusterBackend {
  const tool = "kind";
  return {
    tool,
    isInstalled: () => commandAvailable(exec, tool),
    listClusters: () => attempt(exec, tool, ["get", "clusters"], ({ stdout }) => parseKindClusters(stdout)),
    deleteCluster: (name) => attempt(exec, tool, ["delete", "cluster", "--name", name], () => undefined)
  };
}

function profileNames(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .map((profile: unknown) =>
      typeof profile === "object" && profile !== null && "Name" in profile ? profile.Name : undefined
    )
    .filter((name): name is string => typeof name === "string" && name !== "");
}

/**
 * Profile names from `minikube profile list -o json`, valid and invalid
 * profiles alike since both can be deleted.
 */
export function parseMinikubeProfiles(output: string): string[] {
  if (output.trim() === "") return [];
  const parsed: unknown = JSON.parse(output);
  if (typeof parsed !== "object" || parsed === null) return [];
  const valid = "valid" in parsed ? profileNames(parsed.valid) : [];
  const invalid = "invalid" in parsed ? profileNames(parsed.invalid) : [];
  return [...new Set([...valid, ...invalid])];
}

export function parseKindClusters(output: string): string[] {
  // "No kind clusters found." goes to stderr, but older releases printed it on stdout.
  return parseIdLines(output).filter((line) => !/^No kind clusters found/i.test(line));
}
