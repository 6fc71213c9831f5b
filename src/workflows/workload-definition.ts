import { isPlainRecord } from '../utils/json';

export const WORKLOAD_TEMPLATE_TYPES = ['docker', 'registry', 'codesys', 'vm', 'docker-compose'] as const;

export type WorkloadTemplateType = (typeof WORKLOAD_TEMPLATE_TYPES)[number];

/** Keys the Management System adds to a stored workload; provisioning rejects them. */
export const SERVER_SIDE_KEYS = [
  'createdBy',
  '_id',
  'createdAt',
  'hash',
  'isDeployable',
  'overall_size',
  'summarizedFileStatuses',
  'numberOfServices'
];

/**
 * Drops server-side keys at every depth, including inside arrays of objects. Non-objects pass through.
 */
export function cleanWorkloadDefinition(definition: unknown): unknown {
  if (!isPlainRecord(definition)) {
    return definition;
  }

  const cleaned: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(definition)) {
    if (SERVER_SIDE_KEYS.includes(key)) {
      continue;
    }
    if (Array.isArray(value)) {
      cleaned[key] = value.map((item) => (isPlainRecord(item) ? cleanWorkloadDefinition(item) : item));
    } else {
      cleaned[key] = cleanWorkloadDefinition(value);
    }
  }
  return cleaned;
}

/**
 * Provisioning API version: docker-compose workloads need v3.
 */
export function apiVersionFor(definition: Record<string, unknown>): 2 | 3 {
  return definition.type === 'docker-compose' ? 3 : 2;
}

interface TemplateVariant {
  type: string;
  files: string[];
  networks: unknown[];
  remoteConnections: Array<Record<string, unknown>>;
  properties: Record<string, unknown>;
}

const DEFAULT_TUNNEL = {
  type: 'TUNNEL',
  name: 'test_tunnel',
  acknowledgment: 'No',
  hostname: '127.0.0.1',
  port: 8080,
  localPort: 8080
};

const DOCKER_PROPERTIES = {
  container_name: 'test_workload',
  restart_policy: 'always',
  limit_CPUs: 200,
  limit_memory: { unit: 'MB', value: 256 },
  port_mappings: [{ protocol: 'TCP', host_port: 80, container_port: 8080 }],
  environment_variables: [{ env_variable: 'test_var', container_value: 'var_value' }],
  docker_volumes: []
};

function variantFor(type: WorkloadTemplateType): TemplateVariant {
  switch (type) {
    case 'docker':
      return {
        type: 'docker',
        files: ['nginx.tar.gz'],
        networks: ['bridge'],
        remoteConnections: [{ ...DEFAULT_TUNNEL }],
        properties: { ...DOCKER_PROPERTIES }
      };
    case 'registry':
      return {
        type: 'docker',
        files: [],
        networks: ['bridge'],
        remoteConnections: [{ ...DEFAULT_TUNNEL }],
        properties: {
          ...DOCKER_PROPERTIES,
          docker_file_option: 'path',
          dockerFilePath: 'arvindr226/alpine-ssh',
          auth_credentials: { username: '', password: '' }
        }
      };
    case 'codesys':
      return {
        type: 'codesys',
        files: ['CodesysApp.zip'],
        networks: ['bridge'],
        remoteConnections: [{ ...DEFAULT_TUNNEL }],
        properties: {}
      };
    case 'vm':
      return {
        type: 'vm',
        files: ['slitaz_small.qcow2', 'slitaz_small.qcow2.xml'],
        networks: [{ type: 'Bridged', interface: 'isolated1' }],
        remoteConnections: [
          {
            type: 'TUNNEL',
            name: 'Remote Desktop',
            acknowledgment: 'No',
            hostname: '172.20.2.50',
            port: 3389,
            localPort: 3390
          }
        ],
        properties: {
          limit_CPUs: 200,
          limit_memory: { unit: 'MB', value: 256 },
          snapshot: { enabled: true, value: 1, unit: 'GB' }
        }
      };
    case 'docker-compose':
      return {
        type: 'docker-compose',
        files: [],
        networks: ['bridge'],
        remoteConnections: [{ ...DEFAULT_TUNNEL, serviceName: 'docker-compose-service' }],
        properties: {}
      };
  }
}

/**
 * A definition of the given kind filled with sample values, ready to be edited and provisioned.
 */
export function buildWorkloadTemplate(type: WorkloadTemplateType): Record<string, unknown> {
  const variant = variantFor(type);
  const propertiesKey = variant.type === 'docker-compose' ? 'workloadSpecificProperties' : 'workloadProperties';
  const properties = variant.type === 'codesys' || variant.type === 'docker-compose'
    ? variant.properties
    : { ...variant.properties, networks: variant.networks };

  return {
    name: 'test_workload',
    type: variant.type,
    description: 'description text',
    disabled: false,
    versions: [
      {
        name: 'test_version',
        releaseName: 'test_release',
        selectors: [],
        restartOnConfigurationUpdate: false,
        files: variant.files.map((originalName) => ({ originalName })),
        remoteConnections: variant.remoteConnections,
        [propertiesKey]: properties
      }
    ]
  };
}
