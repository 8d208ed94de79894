import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import * as yaml from 'js-yaml';
import {
  CHART_NAMES,
  isChartName,
  loadValuesFile,
  renderChart,
  resolveValues,
} from '../../../src/charts';
import { isPlainObject } from '../../../src/lib/json';

type Doc = Record<string, unknown>;

async function render(chart: string, options: Parameters<typeof renderChart>[1] = {}): Promise<Doc[]> {
  const rendered = await renderChart(chart, options);
  if (!rendered.ok) {
    throw new Error(rendered.error);
  }
  return yaml.loadAll(rendered.value).filter(isPlainObject);
}

function byKind(docs: Doc[], kind: string): Doc {
  const doc = docs.find((candidate) => candidate.kind === kind);
  if (!doc) {
    throw new Error(`no ${kind} rendered`);
  }
  return doc;
}

describe('renderChart presets', () => {
  it('renders the chat frontend behind a TLS route', async () => {
    const docs = await render('gradio-chart');

    expect(docs.map((doc) => doc.kind)).toEqual(['Deployment', 'Service', 'Route']);
    expect(byKind(docs, 'Deployment')).toMatchObject({
      metadata: {
        name: 'gradio',
        namespace: 'cd-chat',
        labels: {
          'app.kubernetes.io/name': 'gradio',
          'app.kubernetes.io/instance': 'gradio',
          'app.kubernetes.io/version': 'latest',
          'app.kubernetes.io/managed-by': 'cdchat',
        },
      },
      spec: {
        replicas: 1,
        selector: { matchLabels: { 'app.kubernetes.io/name': 'gradio', 'app.kubernetes.io/instance': 'gradio' } },
        template: {
          spec: {
            containers: [
              {
                name: 'gradio',
                image: 'quay.io/cd-chat/cd-chat-assistant:latest',
                imagePullPolicy: 'Always',
                args: ['serve'],
                ports: [{ name: 'http', containerPort: 7860, protocol: 'TCP' }],
              },
            ],
          },
        },
      },
    });
    expect(byKind(docs, 'Route')).toEqual({
      apiVersion: 'route.openshift.io/v1',
      kind: 'Route',
      metadata: byKind(docs, 'Service').metadata,
      spec: {
        to: { kind: 'Service', name: 'gradio', weight: 100 },
        port: { targetPort: 'http' },
        tls: { termination: 'edge', insecureEdgeTerminationPolicy: 'Redirect' },
      },
    });
  });

  it('binds the kubernetes MCP server account to the view role', async () => {
    const docs = await render('kubernetes-mcp-server-chart');

    expect(docs.map((doc) => doc.kind)).toEqual(['ServiceAccount', 'ClusterRoleBinding', 'Deployment', 'Service']);
    expect(byKind(docs, 'ClusterRoleBinding')).toMatchObject({
      metadata: { name: 'kubernetes-mcp-server-view' },
      roleRef: { apiGroup: 'rbac.authorization.k8s.io', kind: 'ClusterRole', name: 'view' },
      subjects: [{ kind: 'ServiceAccount', name: 'kubernetes-mcp-server', namespace: 'cd-chat' }],
    });
    expect(byKind(docs, 'Deployment')).toMatchObject({
      spec: { template: { spec: { serviceAccountName: 'kubernetes-mcp-server' } } },
    });
  });

  it('mounts the LLaMA Stack run configuration and secret references', async () => {
    const docs = await render('llama-stack-chart');

    expect(docs.map((doc) => doc.kind)).toEqual(['ConfigMap', 'Deployment', 'Service']);
    const configMap = byKind(docs, 'ConfigMap');
    expect(configMap.metadata).toMatchObject({ name: 'llama-stack-config' });
    const runYaml = isPlainObject(configMap.data) ? configMap.data['run.yaml'] : undefined;
    expect(typeof runYaml === 'string' && runYaml.startsWith("version: '2'\nimage_name: remote-vllm\n")).toBe(true);

    expect(byKind(docs, 'Deployment')).toMatchObject({
      metadata: { labels: { 'app.kubernetes.io/version': '0.2.15' } },
      spec: {
        template: {
          spec: {
            containers: [
              {
                image: 'docker.io/llamastack/distribution-remote-vllm:0.2.15',
                volumeMounts: [{ name: 'config', mountPath: '/app-config' }],
                env: [
                  { name: 'INFERENCE_MODEL', value: 'llama-3-2-3b' },
                  { name: 'VLLM_URL', value: 'http://llama-3-2-3b-predictor:8080/v1' },
                  { name: 'VLLM_API_TOKEN', valueFrom: { secretKeyRef: { name: 'llama-stack-inference', key: 'token' } } },
                  { name: 'MILVUS_ENDPOINT', value: 'http://milvus:19530' },
                ],
              },
            ],
            volumes: [{ name: 'config', configMap: { name: 'llama-stack-config' } }],
          },
        },
      },
    });
  });

  it('exposes a generic MCP server through an ingress with overrides', async () => {
    const docs = await render('mcp-server-chart', {
      releaseName: 'argocd-mcp',
      set: ['exposure.type=ingress,exposure.host=argocd-mcp.apps.example.test', 'exposure.tls=true'],
    });

    expect(docs.map((doc) => doc.kind)).toEqual(['Deployment', 'Service', 'Ingress']);
    expect(byKind(docs, 'Deployment')).toMatchObject({
      metadata: { name: 'argocd-mcp', labels: { 'app.kubernetes.io/name': 'mcp-server' } },
      spec: { template: { spec: { containers: [{ ports: [{ name: 'http', containerPort: 8080, protocol: 'TCP' }] }] } } },
    });
    expect(byKind(docs, 'Service')).toMatchObject({
      spec: { type: 'ClusterIP', ports: [{ name: 'http', port: 8080, targetPort: 'http', protocol: 'TCP' }] },
    });
    expect(byKind(docs, 'Ingress').spec).toEqual({
      tls: [{ hosts: ['argocd-mcp.apps.example.test'], secretName: 'argocd-mcp-tls' }],
      rules: [
        {
          host: 'argocd-mcp.apps.example.test',
          http: {
            paths: [
              {
                path: '/',
                pathType: 'Prefix',
                backend: { service: { name: 'argocd-mcp', port: { number: 8080 } } },
              },
            ],
          },
        },
      ],
    });
  });
});

describe('container ports', () => {
  async function containerPortOf(chart: string, set: string[] = []): Promise<unknown> {
    const rendered = await renderChart(chart, { set });
    if (!rendered.ok) {
      throw new Error(rendered.error);
    }
    const match = /containerPort: (\d+)/.exec(rendered.value);
    return match ? Number(match[1]) : undefined;
  }

  it('serves MCP JSON-RPC on 8080 for both MCP presets', async () => {
    expect(await containerPortOf('mcp-server-chart')).toBe(8080);
    expect(await containerPortOf('kubernetes-mcp-server-chart')).toBe(8080);
  });

  it('uses service.targetPort when it is set', async () => {
    expect(await containerPortOf('mcp-server-chart', ['service.targetPort=9000'])).toBe(9000);
  });
});

describe('values files', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cdchat-values-'));
    await fs.writeFile(
      path.join(dir, 'servicenow.yaml'),
      [
        'nameOverride: servicenow-mcp',
        'image:',
        '  repository: quay.io/cd-chat/servicenow-mcp',
        '  tag: 1',
        'env:',
        '  - name: SERVICENOW_INSTANCE_URL',
        '    value: https://example.service-now.test',
        '',
      ].join('\n'),
    );
    await fs.writeFile(path.join(dir, 'replicas.yaml'), 'replicaCount: 3\n');
    await fs.writeFile(path.join(dir, 'empty.yaml'), '');
    await fs.writeFile(path.join(dir, 'list.yaml'), '- a\n- b\n');
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('layers files in order and replaces lists', async () => {
    const values = await resolveValues('mcp-server-chart', {
      valuesFiles: [path.join(dir, 'servicenow.yaml'), path.join(dir, 'replicas.yaml')],
    });

    expect(values.ok).toBe(true);
    if (!values.ok) return;
    expect(values.value.nameOverride).toBe('servicenow-mcp');
    expect(values.value.image).toEqual({
      repository: 'quay.io/cd-chat/servicenow-mcp',
      tag: '1',
      pullPolicy: 'IfNotPresent',
    });
    expect(values.value.replicaCount).toBe(3);
    expect(values.value.env).toEqual([{ name: 'SERVICENOW_INSTANCE_URL', value: 'https://example.service-now.test' }]);
  });

  it('lets --set win over files', async () => {
    const values = await resolveValues('mcp-server-chart', {
      valuesFiles: [path.join(dir, 'replicas.yaml')],
      set: ['replicaCount=0'],
    });
    expect(values.ok && values.value.replicaCount).toBe(0);
  });

  it('treats an empty file as no values and rejects non-mappings', async () => {
    expect(await loadValuesFile(path.join(dir, 'empty.yaml'))).toEqual({ ok: true, value: {} });
    expect(await loadValuesFile(path.join(dir, 'list.yaml'))).toEqual({
      ok: false,
      error: `Values file ${path.join(dir, 'list.yaml')} must contain a mapping`,
    });
  });

  it('reports unreadable files', async () => {
    const missing = path.join(dir, 'missing.yaml');
    const result = await loadValuesFile(missing);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.startsWith(`Cannot read values file ${missing}: `)).toBe(true);
    }
  });
});

describe('render errors', () => {
  it('lists the known charts', async () => {
    expect(CHART_NAMES.every(isChartName)).toBe(true);
    expect(await renderChart('redis-chart')).toEqual({
      ok: false,
      error:
        "Unknown chart 'redis-chart'. Available charts: gradio-chart, kubernetes-mcp-server-chart, mcp-server-chart, llama-stack-chart",
    });
  });

  it('reports invalid values with their path', async () => {
    expect(await renderChart('gradio-chart', { set: ['service.port=web'] })).toEqual({
      ok: false,
      error: 'Invalid values for chart gradio-chart: service.port: Expected number, received string',
    });
  });

  it('reports malformed --set expressions', async () => {
    expect(await renderChart('gradio-chart', { set: ['replicaCount'] })).toEqual({
      ok: false,
      error: "Invalid --set expression 'replicaCount': expected key=value",
    });
  });
});
