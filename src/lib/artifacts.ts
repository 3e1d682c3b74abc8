// Path: src/lib/artifacts.ts
// The provisioning artifacts a build produces

export type ArtifactKind = 'text' | 'ignition';

export interface ArtifactSpec {
  id: string;
  /** Template path relative to the templates directory */
  source: string;
  /** Output path relative to the build root, mirroring the boot medium */
  output: string;
  mode: number;
  /** 'ignition' artifacts get their file and drop-in sources embedded */
  kind: ArtifactKind;
}

export const ARTIFACTS: readonly ArtifactSpec[] = [
  {
    id: 'combustion',
    source: 'combustion/script',
    output: 'combustion/script',
    mode: 0o700,
    kind: 'text',
  },
  {
    id: 'ignition',
    source: 'ignition/config.ign',
    output: 'ignition/config.ign',
    mode: 0o600,
    kind: 'ignition',
  },
];
