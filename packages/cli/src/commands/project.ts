/**
 * minidev project
 *
 * Run the services a project directory enables as one environment.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'path';
import type { ServiceRegistry } from '@minidev/core';
import { output } from '../output';
import {
  generateProject,
  loadProject,
  ProjectService,
  MINIKUBE_COMMANDS,
  type Project,
} from '../services/project.service';
import { createServiceCommand } from './service';
import { createCommandRuntime, withErrorHandling, type RuntimeFactory } from './shared';

interface ProjectOptions {
  dir: string;
}

export function createProjectCommand(
  registry: ServiceRegistry,
  runtimeFactory: RuntimeFactory = createCommandRuntime
): Command {
  const command = new Command('project')
    .description('Manage the services enabled by a project .env')
    .option('-d, --dir <path>', 'Project directory', '.')
    .enablePositionalOptions();

  /**
   * Load the project, check the tools it drives, then run `action`
   */
  const withProject = (
    sub: Command,
    action: (service: ProjectService, project: Project) => Promise<boolean>
  ): Promise<void> =>
    withErrorHandling(`project ${sub.name()}`, async () => {
      const { dir } = command.opts<ProjectOptions>();
      const project = loadProject(dir);
      const { runtime, lifecycle } = runtimeFactory(sub, project.settings);
      const service = new ProjectService(project, runtime, lifecycle, registry);
      if (!(await service.validateEnvironment())) {
        return false;
      }
      return action(service, project);
    });

  const start = new Command('start')
    .alias('deploy')
    .description('Start minikube and deploy the enabled services');
  start.action(() => withProject(start, (service) => service.start()));

  const stop = new Command('stop')
    .alias('remove')
    .description('Remove the enabled services');
  stop.action(() => withProject(stop, (service) => service.stop()));

  const restart = new Command('restart').description('Restart the enabled services');
  restart.action(() => withProject(restart, (service) => service.restart()));

  const status = new Command('status').description('Show minikube, service and project status');
  status.action(() => withProject(status, (service) => service.status()));

  const logs = new Command('logs')
    .description('Show logs for one service, or for every enabled service')
    .argument('[service]', 'Service to show logs for')
    .argument('[args...]', 'Log arguments passed to the service')
    .option('-f, --follow', 'Follow log output', false);
  logs.action((name: string | undefined, args: string[], options: { follow: boolean }) =>
    withProject(logs, (service) => service.logs(name, args, options.follow))
  );

  const minikube = new Command('minikube')
    .description(`Control minikube (${MINIKUBE_COMMANDS.join(', ')})`)
    .argument('[command]', 'Minikube command', 'status');
  minikube.action((subcommand: string) => withProject(minikube, (service) => service.minikube(subcommand)));

  const serviceCommand = new Command('service')
    .description('Run a service command with the project namespace and settings')
    .argument('<service>', 'Catalog service id or alias')
    .argument('[args...]', 'Service subcommand and its arguments')
    .allowUnknownOption()
    .passThroughOptions();
  serviceCommand.action((id: string, args: string[]) =>
    withProject(serviceCommand, async (_service, project) => {
      const definition = registry.require(id);
      const scoped = createServiceCommand(definition, (sub) => runtimeFactory(sub, project.settings));
      await scoped.parseAsync(args, { from: 'user' });
      return true;
    })
  );

  const generate = new Command('generate')
    .description('Generate a project .env and setup-env.sh')
    .argument('<name>', 'Project name (also the namespace)')
    .argument('[description]', 'Project description')
    .argument('[targetDir]', 'Directory to write into (defaults to --dir)')
    .option('-s, --services <list>', 'Comma-separated services to enable')
    .option('--force', 'Overwrite an existing .env', false);
  generate.action(
    (
      name: string,
      description: string | undefined,
      targetDir: string | undefined,
      options: { services?: string; force: boolean }
    ) =>
      withErrorHandling('project generate', async () => {
        const dir = path.resolve(targetDir ?? command.opts<ProjectOptions>().dir);
        const enabledServices = options.services
          ?.split(',')
          .map((service) => service.trim())
          .filter((service) => service.length > 0);
        for (const service of enabledServices ?? []) {
          registry.require(service);
        }

        const files = generateProject({ name, description, targetDir: dir, enabledServices, force: options.force });

        output.success(`Generated project setup for '${name}' in ${dir}`);
        output.info('Files created:');
        for (const file of files) {
          output.line(`  - ${file.path}`);
        }
        output.line();
        output.info('Usage:');
        output.line(chalk.gray(`  cd ${dir}`));
        output.line(chalk.gray('  ./setup-env.sh start'));
      })
  );

  command
    .addCommand(start)
    .addCommand(stop)
    .addCommand(restart)
    .addCommand(status, { isDefault: true })
    .addCommand(logs)
    .addCommand(minikube)
    .addCommand(serviceCommand)
    .addCommand(generate);

  return command;
}
