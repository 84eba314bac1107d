/**
 * Project .env generator
 */

import type { EnvSection, ProjectOptions } from './types';

const RULE = `# ${'='.repeat(77)}`;

export function projectEnvSections(options: ProjectOptions): EnvSection[] {
  return [
    {
      header: 'Project Configuration',
      variables: [
        { name: 'PROJECT_NAME', value: options.name },
        { name: 'PROJECT_DESCRIPTION', value: options.description ?? `${options.name} Environment` },
      ],
    },
    {
      header: 'Kubernetes Configuration',
      variables: [{ name: 'NAMESPACE', value: options.name }],
    },
    {
      header: 'Service Selection',
      variables: [{ name: 'ENABLED_SERVICES', value: options.enabledServices.join(',') }],
      notes: [
        'Other combinations:',
        'ENABLED_SERVICES="minio,spark"          # Storage + processing',
        'ENABLED_SERVICES="minio,airflow"        # Storage + orchestration',
        'ENABLED_SERVICES="postgres,mongodb"     # Databases only',
      ],
    },
    {
      header: 'Minikube Configuration',
      variables: [
        { name: 'MINIKUBE_CPUS', value: '4' },
        { name: 'MINIKUBE_MEMORY', value: '8192' },
        { name: 'MINIKUBE_DISK_SIZE', value: '20g' },
        { name: 'MINIKUBE_DRIVER', value: 'docker' },
      ],
    },
    {
      header: 'Manifests',
      variables: [
        {
          name: 'PROJECT_MANIFESTS_DIR',
          value: 'manifests',
          comment: 'Files named <service>.yaml here replace the bundled manifests',
        },
      ],
    },
  ];
}

export function generateEnvContent(sections: EnvSection[], title: string): string {
  const lines: string[] = [RULE, `# ${title} Environment Configuration`, RULE, ''];

  for (const section of sections) {
    lines.push(`# ${section.header}`);
    for (const variable of section.variables) {
      if (variable.comment) {
        lines.push(`# ${variable.comment}`);
      }
      lines.push(`${variable.name}="${variable.value}"`);
    }
    for (const note of section.notes ?? []) {
      lines.push(`# ${note}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
