/**
 * minidev list
 *
 * List the service catalog
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { ServiceDefinition, ServiceRegistry } from '@minidev/core';

export function formatServiceRow(service: ServiceDefinition, idWidth: number): string {
  const aliases = service.aliases.length > 0 ? chalk.gray(` (${service.aliases.join(', ')})`) : '';
  return `  ${chalk.cyan(service.id.padEnd(idWidth))}  ${service.description}${aliases}`;
}

export function createListCommand(registry: ServiceRegistry): Command {
  return new Command('list')
    .description('List the services minidev can deploy')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      const services = registry.getAll();

      if (options.json) {
        const rows = services.map(({ id, name, aliases, description }) => ({ id, name, aliases, description }));
        console.log(JSON.stringify(rows, null, 2));
        return;
      }

      const idWidth = Math.max(...services.map((service) => service.id.length));
      console.log(chalk.bold('\n  Services\n'));
      for (const service of services) {
        console.log(formatServiceRow(service, idWidth));
      }
      console.log(chalk.gray('\n  Run `minidev <service> --help` for service commands.\n'));
    });
}
