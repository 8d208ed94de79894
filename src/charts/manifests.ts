/**
 * Kubernetes resources generated from validated chart values
 */

import type { ChartValues, EnvVar } from './values.js';

export interface K8sResource {
  apiVersion: string;
  kind: string;
  metadata: {
    name: string;
    namespace?: string;
    labels: Record<string, string>;
  };
  [key: string]: unknown;
}

export interface ReleaseInfo {
  /** Chart preset name, e.g. gradio-chart */
  chart: string;
  releaseName: string;
}

export const MANAGED_BY = 'cdchat';

/**
 * `gradio-chart` serves the `gradio` app
 */
export function appName(chart: string): string {
  return chart.replace(/-chart$/, '');
}

export function fullName(values: ChartValues, release: ReleaseInfo): string {
  return values.nameOverride ?? release.releaseName;
}

export function selectorLabels(values: ChartValues, release: ReleaseInfo): Record<string, string> {
  return {
    'app.kubernetes.io/name': appName(release.chart),
    'app.kubernetes.io/instance': fullName(values, release),
  };
}

export function standardLabels(values: ChartValues, release: ReleaseInfo): Record<string, string> {
  return {
    ...selectorLabels(values, release),
    'app.kubernetes.io/version': values.image.tag,
    'app.kubernetes.io/managed-by': MANAGED_BY,
  };
}

function serviceAccountName(values: ChartValues, name: string): string | undefined {
  if (values.serviceAccount.create) {
    return values.serviceAccount.name ?? name;
  }
  return values.serviceAccount.name;
}

function containerEnv(env: EnvVar[]): Array<Record<string, unknown>> {
  return env.map((variable) =>
    'secretKeyRef' in variable
      ? { name: variable.name, valueFrom: { secretKeyRef: variable.secretKeyRef } }
      : { name: variable.name, value: variable.value },
  );
}

function hasResources(values: ChartValues): boolean {
  return values.resources.requests !== undefined || values.resources.limits !== undefined;
}

export function buildManifests(values: ChartValues, release: ReleaseInfo): K8sResource[] {
  const name = fullName(values, release);
  const namespace = values.namespace ?? 'default';
  const labels = standardLabels(values, release);
  const metadata = (resourceName: string): K8sResource['metadata'] => ({
    name: resourceName,
    namespace,
    labels,
  });

  const resources: K8sResource[] = [];
  const accountName = serviceAccountName(values, name);

  if (values.serviceAccount.create && accountName) {
    resources.push({ apiVersion: 'v1', kind: 'ServiceAccount', metadata: metadata(accountName) });
  }

  if (values.rbac.clusterRole) {
    resources.push({
      apiVersion: 'rbac.authorization.k8s.io/v1',
      kind: 'ClusterRoleBinding',
      metadata: { name: `${name}-${values.rbac.clusterRole}`, labels },
      roleRef: {
        apiGroup: 'rbac.authorization.k8s.io',
        kind: 'ClusterRole',
        name: values.rbac.clusterRole,
      },
      subjects: [{ kind: 'ServiceAccount', name: accountName ?? 'default', namespace }],
    });
  }

  const configMapName = `${name}-config`;
  if (values.config) {
    resources.push({
      apiVersion: 'v1',
      kind: 'ConfigMap',
      metadata: metadata(configMapName),
      data: { [values.config.fileName]: values.config.content },
    });
  }

  const containerPort = values.service.targetPort ?? values.service.port;
  const container: Record<string, unknown> = {
    name: appName(release.chart),
    image: `${values.image.repository}:${values.image.tag}`,
    imagePullPolicy: values.image.pullPolicy,
    ...(values.args.length > 0 ? { args: values.args } : {}),
    ports: [{ name: 'http', containerPort, protocol: 'TCP' }],
    ...(values.env.length > 0 ? { env: containerEnv(values.env) } : {}),
    ...(hasResources(values) ? { resources: values.resources } : {}),
    ...(values.config ? { volumeMounts: [{ name: 'config', mountPath: values.config.mountPath }] } : {}),
  };

  resources.push({
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: metadata(name),
    spec: {
      replicas: values.replicaCount,
      selector: { matchLabels: selectorLabels(values, release) },
      template: {
        metadata: { labels },
        spec: {
          ...(accountName ? { serviceAccountName: accountName } : {}),
          containers: [container],
          ...(values.config ? { volumes: [{ name: 'config', configMap: { name: configMapName } }] } : {}),
        },
      },
    },
  });

  resources.push({
    apiVersion: 'v1',
    kind: 'Service',
    metadata: metadata(name),
    spec: {
      type: 'ClusterIP',
      ports: [{ name: 'http', port: values.service.port, targetPort: 'http', protocol: 'TCP' }],
      selector: selectorLabels(values, release),
    },
  });

  const { exposure } = values;
  if (exposure.type === 'ingress') {
    resources.push({
      apiVersion: 'networking.k8s.io/v1',
      kind: 'Ingress',
      metadata: metadata(name),
      spec: {
        ...(exposure.ingressClassName ? { ingressClassName: exposure.ingressClassName } : {}),
        ...(exposure.tls && exposure.host
          ? { tls: [{ hosts: [exposure.host], secretName: `${name}-tls` }] }
          : {}),
        rules: [
          {
            ...(exposure.host ? { host: exposure.host } : {}),
            http: {
              paths: [
                {
                  path: '/',
                  pathType: 'Prefix',
                  backend: { service: { name, port: { number: values.service.port } } },
                },
              ],
            },
          },
        ],
      },
    });
  } else if (exposure.type === 'route') {
    resources.push({
      apiVersion: 'route.openshift.io/v1',
      kind: 'Route',
      metadata: metadata(name),
      spec: {
        ...(exposure.host ? { host: exposure.host } : {}),
        to: { kind: 'Service', name, weight: 100 },
        port: { targetPort: 'http' },
        ...(exposure.tls
          ? { tls: { termination: 'edge', insecureEdgeTerminationPolicy: 'Redirect' } }
          : {}),
      },
    });
  }

  return resources;
}
