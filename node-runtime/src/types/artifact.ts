export type ArtifactDirection = 'inputs' | 'outputs';

export interface ArtifactValue {
  digest?: Record<string, string>;
  uri?: string;
}

export interface Artifact {
  name: string;
  values: ArtifactValue[];
  buildOutput?: boolean;
}

export interface Artifacts {
  inputs?: Artifact[];
  outputs?: Artifact[];
}

export interface ArtifactTemplate {
  containerName: string;
  direction: ArtifactDirection;
  artifactName: string;
}
