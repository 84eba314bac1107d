/**
 * minidev <service>
 *
 * One command per catalog service, with the shared lifecycle subcommands and
 * the service's own actions.
 */

import { Command } from 'commander';
import type { ActionArgument, ServiceAction, ServiceDefinition } from '@minidev/core';
import { createCommandRuntime, withErrorHandling, type RuntimeFactory } from './shared';

function formatArgument(argument: ActionArgument): string {
  const name = argument.variadic ? `${argument.name}...` : argument.name;
  return argument.required ? `<${name}>` : `[${name}]`;
}

function helpText(definition: ServiceDefinition): string {
  const lines: string[] = [];
  if (definition.notes.length > 0) {
    lines.push('', 'Notes:', ...definition.notes.map((note) => `  ${note}`));
  }
  if (definition.examples.length > 0) {
    lines.push('', 'Examples:', ...definition.examples.map((example) => `  ${example}`));
  }
  return lines.join('\n');
}

/**
 * Build the commander command for a service action, nesting subactions
 */
export function createActionCommand(
  definition: ServiceDefinition,
  action: ServiceAction,
  runtimeFactory: RuntimeFactory
): Command {
  const command = new Command(action.name).description(action.description);
  for (const alias of action.aliases ?? []) {
    command.alias(alias);
  }

  if (action.subactions) {
    command.enablePositionalOptions();
    for (const subaction of action.subactions) {
      command.addCommand(createActionCommand(definition, subaction, runtimeFactory));
    }
  }

  for (const argument of action.arguments ?? []) {
    command.argument(formatArgument(argument), argument.description ?? '');
  }

  if (action.passThrough) {
    command.allowUnknownOption().passThroughOptions();
  }

  const run = action.run;
  if (run) {
    command.action(() =>
      withErrorHandling(`${definition.id} ${action.name}`, () => {
        const { runtime } = runtimeFactory(command);
        return run(runtime.ctx, command.args);
      })
    );
  }

  return command;
}

export function createServiceCommand(
  definition: ServiceDefinition,
  runtimeFactory: RuntimeFactory = createCommandRuntime
): Command {
  const command = new Command(definition.id)
    .description(definition.description)
    .enablePositionalOptions();
  for (const alias of definition.aliases) {
    command.alias(alias);
  }

  const actionNames = new Set(definition.actions.flatMap((action) => [action.name, ...(action.aliases ?? [])]));

  const deploy = new Command('deploy')
    .alias('start')
    .description(`Deploy ${definition.name}`);
  deploy.action(() =>
    withErrorHandling(`${definition.id} deploy`, () => runtimeFactory(deploy).lifecycle.deploy(definition))
  );
  command.addCommand(deploy);

  const remove = new Command('remove')
    .aliases(['stop', 'delete'])
    .description(`Remove ${definition.name}`);
  remove.action(() =>
    withErrorHandling(`${definition.id} remove`, () => runtimeFactory(remove).lifecycle.remove(definition))
  );
  command.addCommand(remove);

  if (definition.workloads.some((workload) => workload.restartable !== false)) {
    const restart = new Command('restart').description(`Restart ${definition.name}`);
    restart.action(() =>
      withErrorHandling(`${definition.id} restart`, () => runtimeFactory(restart).lifecycle.restart(definition))
    );
    command.addCommand(restart);
  }

  const status = new Command('status').description(`Show ${definition.name} status`);
  status.action(() =>
    withErrorHandling(`${definition.id} status`, () => runtimeFactory(status).lifecycle.status(definition))
  );
  command.addCommand(status, { isDefault: true });

  const logsUsage = definition.logTargets
    ? `component (${definition.logTargets.targets.map((target) => target.name).join(', ')}), lines, follow`
    : 'lines, follow';
  const logs = new Command('logs')
    .description(`Show ${definition.name} logs`)
    .argument('[args...]', logsUsage)
    .option('-f, --follow', 'Follow log output', false);
  logs.action((args: string[], options: { follow: boolean }) =>
    withErrorHandling(`${definition.id} logs`, () =>
      runtimeFactory(logs).lifecycle.logs(definition, args, options.follow)
    )
  );
  command.addCommand(logs);

  if (definition.healthCheck && !actionNames.has('health')) {
    const health = new Command('health').description(`Check ${definition.name} health`);
    health.action(() =>
      withErrorHandling(`${definition.id} health`, () => runtimeFactory(health).lifecycle.health(definition))
    );
    command.addCommand(health);
  }

  for (const action of definition.actions) {
    command.addCommand(createActionCommand(definition, action, runtimeFactory));
  }

  const help = helpText(definition);
  if (help) {
    command.addHelpText('after', help);
  }

  return command;
}
