import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Artifacts, ArtifactTemplate, ArtifactValue } from '../types/index.js';
import { ArtifactsSchema } from '../schemas/index.js';
import { ArtifactError, errorMessage } from '../exception/errors.js';
import { ARTIFACTS_DIR, ARTIFACTS_MANIFEST, containerNameFor } from '../config/defaults.js';

/** Every `$(steps.<step>.inputs|outputs...)` occurrence in a string. */
export const STEP_ARTIFACT_PATTERN = /\$\(steps\.[^()$]+?\.(?:inputs|outputs)\.[^()$]*?\)/g;

const TEMPLATE_SHAPE = /^\$\(steps\.([^.()$]+)\.(inputs|outputs)\.([^.()$]+)\)$/;

export function parseArtifactTemplate(input: string): ArtifactTemplate {
  if (input === '') {
    throw new ArtifactError('artifact template is empty');
  }
  const match = TEMPLATE_SHAPE.exec(input);
  if (!match) {
    throw new ArtifactError(
      `invalid artifact template "${input}": expected $(steps.<step>.inputs.<name>) or $(steps.<step>.outputs.<name>)`,
    );
  }
  const [, stepName, direction, artifactName] = match;
  return {
    containerName: containerNameFor(stepName),
    direction: direction === 'inputs' ? 'inputs' : 'outputs',
    artifactName,
  };
}

export function stepArtifactsPath(stepsDir: string, containerName: string): string {
  return join(stepsDir, containerName, ARTIFACTS_DIR, ARTIFACTS_MANIFEST);
}

export function parseArtifacts(raw: string, source: string): Artifacts {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ArtifactError(`malformed artifacts manifest ${source}: ${errorMessage(error)}`, { cause: error });
  }
  const parsed = ArtifactsSchema.safeParse(json);
  if (!parsed.success) {
    throw new ArtifactError(`invalid artifacts manifest ${source}: ${parsed.error.message}`, { cause: parsed.error });
  }
  return parsed.data;
}

export async function loadStepArtifacts(stepsDir: string, containerName: string): Promise<Artifacts> {
  const path = stepArtifactsPath(stepsDir, containerName);
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ArtifactError(`failed to read artifacts manifest ${path}: ${errorMessage(error)}`, { cause: error });
  }
  return parseArtifacts(raw, path);
}

/**
 * Compact JSON the way the control plane writes it: empty fields dropped,
 * digest algorithms in sorted order.
 */
export function serializeArtifactValues(values: ArtifactValue[]): string {
  const normalized = values.map((value) => {
    const out: ArtifactValue = {};
    const algorithms = Object.keys(value.digest ?? {}).sort();
    if (value.digest && algorithms.length > 0) {
      const digest: Record<string, string> = {};
      for (const algorithm of algorithms) digest[algorithm] = value.digest[algorithm];
      out.digest = digest;
    }
    if (value.uri) out.uri = value.uri;
    return out;
  });
  return JSON.stringify(normalized);
}

export async function getArtifactValues(stepsDir: string, template: string): Promise<string> {
  const parsed = parseArtifactTemplate(template);
  const artifacts = await loadStepArtifacts(stepsDir, parsed.containerName);
  const candidates = parsed.direction === 'inputs' ? artifacts.inputs : artifacts.outputs;
  const artifact = candidates?.find((a) => a.name === parsed.artifactName);
  if (!artifact) {
    throw new ArtifactError(
      `artifact "${parsed.artifactName}" not found in ${parsed.direction} of ${parsed.containerName}`,
    );
  }
  return serializeArtifactValues(artifact.values);
}
