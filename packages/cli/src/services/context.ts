/**
 * Builds the ServiceContext handed to service definitions
 */

import inquirer from 'inquirer';
import type { HttpClient, Output, Prompter, ServiceContext } from '@minidev/core';
import type { Settings } from '../config/settings';
import { output as consoleOutput } from '../output';
import { FetchHttpClient } from './http.service';
import { Kubectl, type KubectlOptions } from './kubectl.service';
import { Minikube } from './minikube.service';
import { NodeCommandRunner, type CommandRunner } from './process.service';

export const inquirerPrompter: Prompter = {
  async confirm(message: string, defaultValue = false): Promise<boolean> {
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      {
        type: 'confirm',
        name: 'confirmed',
        message,
        default: defaultValue,
      },
    ]);
    return confirmed;
  },
};

export interface RuntimeOptions {
  settings: Settings;
  /** Overrides settings.namespace */
  namespace?: string;
  runner?: CommandRunner;
  out?: Output;
  http?: HttpClient;
  prompt?: Prompter;
  sleep?: (ms: number) => Promise<void>;
  kubectl?: KubectlOptions;
}

/**
 * Everything a command needs to drive the cluster
 */
export interface Runtime {
  settings: Settings;
  runner: CommandRunner;
  out: Output;
  kube: Kubectl;
  minikube: Minikube;
  ctx: ServiceContext;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function createRuntime(options: RuntimeOptions): Runtime {
  const runner = options.runner ?? new NodeCommandRunner();
  const out = options.out ?? consoleOutput;
  const sleep = options.sleep ?? defaultSleep;
  const kube = new Kubectl(runner, out, { sleep, ...options.kubectl });
  const minikube = new Minikube(runner, out, options.settings.minikube);

  const ctx: ServiceContext = {
    namespace: options.namespace ?? options.settings.namespace,
    projectPath: options.settings.sparkProjectPath,
    kube,
    cluster: minikube,
    http: options.http ?? new FetchHttpClient(),
    prompt: options.prompt ?? inquirerPrompter,
    out,
    sleep,
    async openUrl(url: string): Promise<boolean> {
      const opener = process.platform === 'darwin' ? 'open' : 'xdg-open';
      const result = await runner.run(opener, [url]);
      return result.code === 0;
    },
  };

  return { settings: options.settings, runner, out, kube, minikube, ctx };
}
