// Path: src/lib/builder.ts
// Build orchestration: load, validate, render, write

import path from 'node:path';
import { ARTIFACTS, type ArtifactSpec } from './artifacts.js';
import { assembleIgnition } from './ignition/assembler.js';
import { buildLogger as log } from './logger.js';
import { writeBuildOutput, type RenderedArtifact, type WrittenFile } from './output-writer.js';
import { SECRET_DEFINITIONS } from './secrets/definitions.js';
import { SecretLoader } from './secrets/loader.js';
import type { EnvSource, SecretDefinition, TemplateBindings } from './secrets/types.js';
import { toBindings, validateSecrets } from './secrets/validator.js';
import { HandlebarsEngine } from './template/handlebars-engine.js';
import { readTemplate } from './template/reader.js';
import type { TemplateEngine } from './template/types.js';
import { hashContent } from '../utils/file.js';

export interface BuildOptions {
  /** Environment the secrets are read from */
  env: EnvSource;
  templatesDir: string;
  outputDir: string;
  engine?: TemplateEngine;
  artifacts?: readonly ArtifactSpec[];
  definitions?: readonly SecretDefinition[];
  /** Render everything but write nothing */
  dryRun?: boolean;
}

export interface BuildResult {
  outputDir: string;
  files: WrittenFile[];
  dryRun: boolean;
}

/**
 * Render one artifact in memory
 */
export function renderArtifact(
  artifact: ArtifactSpec,
  bindings: TemplateBindings,
  templatesDir: string,
  engine: TemplateEngine
): RenderedArtifact {
  const render = (source: string, templateId: string): string => engine.render(source, bindings, templateId);
  const source = readTemplate(templatesDir, artifact.source);

  log.debug({
    artifact: artifact.id,
    engine: engine.name,
    references: engine.references(source, artifact.source).map((ref) => ref.name),
  }, 'Rendering artifact');
  const rendered = render(source, artifact.source);

  const content = artifact.kind === 'ignition'
    ? assembleIgnition(rendered, artifact.source, { templatesDir, render }).text
    : rendered;

  log.debug({ artifact: artifact.id, bytes: content.length }, 'Artifact rendered');
  return {
    id: artifact.id,
    relativePath: artifact.output,
    content,
    mode: artifact.mode,
  };
}

/**
 * Run a full build.
 *
 * Every stage runs to completion before the next starts, and nothing touches
 * the output directory until every artifact has rendered. Errors from any
 * stage propagate unchanged.
 */
export function buildArtifacts(options: BuildOptions): BuildResult {
  const templatesDir = path.resolve(options.templatesDir);
  const outputDir = path.resolve(options.outputDir);
  const engine = options.engine ?? new HandlebarsEngine();
  const artifacts = options.artifacts ?? ARTIFACTS;
  const dryRun = options.dryRun ?? false;

  log.info({ templatesDir, outputDir, dryRun }, 'Starting build');

  const secrets = new SecretLoader(options.env, options.definitions ?? SECRET_DEFINITIONS).load();
  const bindings = toBindings(validateSecrets(secrets));

  const rendered = artifacts.map((artifact) => renderArtifact(artifact, bindings, templatesDir, engine));

  if (dryRun) {
    return {
      outputDir,
      dryRun,
      files: rendered.map((artifact) => ({
        id: artifact.id,
        relativePath: artifact.relativePath,
        path: path.join(outputDir, artifact.relativePath),
        mode: artifact.mode,
        bytes: Buffer.byteLength(artifact.content, 'utf-8'),
        sha256: hashContent(artifact.content),
      })),
    };
  }

  const files = writeBuildOutput(outputDir, rendered);
  log.info({ outputDir, files: files.length }, 'Build complete');
  return { outputDir, files, dryRun };
}
