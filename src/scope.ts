import { basename } from "path";
import { DockerBackend } from "./docker";

export const COMPOSE_PROJECT_LABEL = "com.docker.compose.project";

export interface ProjectScope {
  project: string;
  containers: string[];
  images: string[];
  volumes: string[];
}

/**
 * Resources of the compose project named after `cwd`: its containers, the
 * images they run and the named volumes they mount. Anything that cannot be
 * resolved is left out.
 */
export async function resolveProjectScope(docker: DockerBackend, cwd: string): Promise<ProjectScope> {
  const project = basename(cwd);
  const scope: ProjectScope = { project, containers: [], images: [], volumes: [] };
  if (!project) return scope;

  const ids = await docker.listContainers([`label=${COMPOSE_PROJECT_LABEL}=${project}`]);
  if (!ids.ok) return scope;

  for (const id of ids.value) {
    scope.containers.push(id);
    const details = await docker.inspectContainer(id);
    if (!details.ok) continue;
    if (details.value.imageRef) scope.images.push(details.value.imageRef);
    scope.volumes.push(...details.value.volumeMounts);
  }

  return scope;
}
