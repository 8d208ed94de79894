/**
 * Chart renderer
 *
 * Layers a preset `values.yaml`, user values files and `--set` overrides,
 * validates the result and prints the manifests as a YAML stream.
 */

import { existsSync, promises as fs } from 'node:fs';
import path from 'node:path';
import * as yaml from 'js-yaml';
import type { Logger } from 'pino';
import { Success, Failure, type Result } from '../domain/types/index.js';
import { errorMessage } from '../lib/errors.js';
import { isPlainObject } from '../lib/json.js';
import { buildManifests, appName, type K8sResource } from './manifests.js';
import { applySetExpression, mergeValues, type Values } from './merge.js';
import { chartValuesSchema, type ChartValues } from './values.js';

export const CHART_NAMES = [
  'gradio-chart',
  'kubernetes-mcp-server-chart',
  'mcp-server-chart',
  'llama-stack-chart',
] as const;

export type ChartName = (typeof CHART_NAMES)[number];

export interface RenderOptions {
  /** Defaults to the chart name without its `-chart` suffix */
  releaseName?: string;
  valuesFiles?: string[];
  set?: string[];
  /** Directory holding one sub-directory per chart */
  chartsDir?: string;
  logger?: Logger;
}

export function isChartName(name: string): name is ChartName {
  return CHART_NAMES.some((chart) => chart === name);
}

/**
 * `charts/` at the project root, from the sources or from the build output
 */
export function resolveChartsDir(): string {
  const fromSources = path.resolve(__dirname, '..', '..', 'charts');
  const fromBuild = path.resolve(__dirname, '..', '..', '..', 'charts');
  return existsSync(fromSources) ? fromSources : fromBuild;
}

export async function loadValuesFile(file: string): Promise<Result<Values>> {
  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (error) {
    return Failure(`Cannot read values file ${file}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    return Failure(`Invalid YAML in ${file}: ${errorMessage(error)}`);
  }

  if (parsed === undefined || parsed === null) {
    return Success({});
  }
  if (!isPlainObject(parsed)) {
    return Failure(`Values file ${file} must contain a mapping`);
  }
  return Success(parsed);
}

export function validateValues(chart: string, values: Values): Result<ChartValues> {
  const parsed = chartValuesSchema.safeParse(values);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    return Failure(`Invalid values for chart ${chart}: ${problems.join('; ')}`);
  }
  return Success(parsed.data);
}

export async function resolveValues(chart: string, options: RenderOptions = {}): Promise<Result<ChartValues>> {
  if (!isChartName(chart)) {
    return Failure(`Unknown chart '${chart}'. Available charts: ${CHART_NAMES.join(', ')}`);
  }

  const chartsDir = options.chartsDir ?? resolveChartsDir();
  const preset = await loadValuesFile(path.join(chartsDir, chart, 'values.yaml'));
  if (!preset.ok) {
    return Failure(preset.error);
  }

  let values = preset.value;
  for (const file of options.valuesFiles ?? []) {
    const layer = await loadValuesFile(file);
    if (!layer.ok) {
      return Failure(layer.error);
    }
    values = mergeValues(values, layer.value);
  }

  for (const expression of options.set ?? []) {
    const applied = applySetExpression(values, expression);
    if (!applied.ok) {
      return Failure(applied.error);
    }
    values = applied.value;
  }

  return validateValues(chart, values);
}

export function toYaml(resources: K8sResource[]): string {
  return resources.map((resource) => yaml.dump(resource, { noRefs: true, lineWidth: -1 })).join('---\n');
}

export async function renderChart(chart: string, options: RenderOptions = {}): Promise<Result<string>> {
  const values = await resolveValues(chart, options);
  if (!values.ok) {
    options.logger?.error({ chart, error: values.error }, 'Chart values rejected');
    return Failure(values.error);
  }

  const releaseName = options.releaseName ?? appName(chart);
  const resources = buildManifests(values.value, { chart, releaseName });
  options.logger?.info(
    { chart, releaseName, kinds: resources.map((resource) => resource.kind) },
    'Rendered chart',
  );
  return Success(toYaml(resources));
}
