export {
  CHART_NAMES,
  isChartName,
  loadValuesFile,
  renderChart,
  resolveChartsDir,
  resolveValues,
  toYaml,
  validateValues,
  type ChartName,
  type RenderOptions,
} from './renderer.js';
export { buildManifests, standardLabels, type K8sResource, type ReleaseInfo } from './manifests.js';
export { applySetExpression, mergeValues, parseScalar, type Values } from './merge.js';
export { chartValuesSchema, type ChartValues, type ExposureType } from './values.js';
