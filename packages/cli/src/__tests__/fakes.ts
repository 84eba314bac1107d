/**
 * In-process stand-ins for kubectl, minikube, HTTP and the terminal
 */

import type { HttpClient, HttpRequest, HttpResponse, Output, Prompter } from '@minidev/core';
import type { Settings } from '../config/settings';
import { createRuntime, type Runtime } from '../services/context';
import type { CommandRunner, InteractiveOptions, RunOptions, RunResult } from '../services/process.service';

// =============================================================================
// Command runner
// =============================================================================

export interface RecordedCall {
  mode: 'run' | 'interactive' | 'background';
  command: string;
  args: string[];
  options?: RunOptions | InteractiveOptions;
}

type Reply = Partial<RunResult>;

interface Rule {
  prefix: string;
  replies: Reply[];
}

/**
 * Answers commands by prefix of `command arg1 arg2 ...`. The most recently
 * registered matching rule wins; a rule with several replies hands them out
 * in order and then repeats the last. Unmatched commands succeed silently.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly rules: Rule[] = [];
  private nextPid = 4242;

  on(prefix: string, ...replies: Reply[]): this {
    this.rules.unshift({ prefix, replies });
    return this;
  }

  private reply(command: string, args: string[]): RunResult {
    const line = [command, ...args].join(' ');
    const rule = this.rules.find((candidate) => line.startsWith(candidate.prefix));
    const reply = rule ? (rule.replies.length > 1 ? rule.replies.shift() : rule.replies[0]) : undefined;
    return { code: 0, stdout: '', stderr: '', ...reply };
  }

  async run(command: string, args: string[], options?: RunOptions): Promise<RunResult> {
    this.calls.push({ mode: 'run', command, args, options });
    return this.reply(command, args);
  }

  async interactive(command: string, args: string[], options?: InteractiveOptions): Promise<number> {
    this.calls.push({ mode: 'interactive', command, args, options });
    return this.reply(command, args).code;
  }

  background(command: string, args: string[]): number | undefined {
    this.calls.push({ mode: 'background', command, args });
    return this.nextPid++;
  }

  /** Every call rendered as `command arg1 arg2 ...` */
  lines(): string[] {
    return this.calls.map((call) => [call.command, ...call.args].join(' '));
  }

  find(prefix: string): RecordedCall | undefined {
    return this.calls.find((call) => [call.command, ...call.args].join(' ').startsWith(prefix));
  }
}

// =============================================================================
// Output
// =============================================================================

export class RecordingOutput implements Output {
  readonly lines: string[] = [];

  header(title: string): void {
    this.lines.push(`# ${title}`);
  }

  success(message: string): void {
    this.lines.push(`✓ ${message}`);
  }

  warning(message: string): void {
    this.lines.push(`⚠ ${message}`);
  }

  error(message: string): void {
    this.lines.push(`✖ ${message}`);
  }

  info(message: string): void {
    this.lines.push(`ℹ ${message}`);
  }

  line(message = ''): void {
    this.lines.push(message);
  }
}

// =============================================================================
// HTTP and prompts
// =============================================================================

export class FakeHttp implements HttpClient {
  readonly requests: HttpRequest[] = [];

  constructor(private readonly respond: (request: HttpRequest) => HttpResponse = () => ({ status: 200, ok: true, body: {} })) {}

  async request(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    return this.respond(request);
  }
}

export class FakePrompter implements Prompter {
  readonly questions: string[] = [];

  constructor(private readonly answer = false) {}

  async confirm(message: string): Promise<boolean> {
    this.questions.push(message);
    return this.answer;
  }
}

// =============================================================================
// Runtime
// =============================================================================

export function testSettings(overrides: Partial<Settings> = {}): Settings {
  return {
    namespace: 'dev',
    minikube: {
      cpus: 4,
      memory: 8192,
      diskSize: '40g',
      runtime: 'containerd',
      kubernetesVersion: 'v1.28.0',
      profile: 'minikube',
    },
    projectRoot: '/work',
    sparkProjectPath: '/work/spark',
    ...overrides,
  };
}

export interface TestRuntime extends Runtime {
  fake: FakeRunner;
  output: RecordingOutput;
  http: FakeHttp;
  prompter: FakePrompter;
  sleeps: number[];
}

export interface TestRuntimeOptions {
  settings?: Settings;
  http?: FakeHttp;
  confirm?: boolean;
  /** Clock used for StatefulSet deadlines; advances by each sleep */
  startTime?: number;
}

export function createTestRuntime(options: TestRuntimeOptions = {}): TestRuntime {
  const fake = new FakeRunner();
  const output = new RecordingOutput();
  const http = options.http ?? new FakeHttp();
  const prompter = new FakePrompter(options.confirm ?? false);
  const sleeps: number[] = [];
  let clock = options.startTime ?? 0;

  const sleep = async (ms: number): Promise<void> => {
    sleeps.push(ms);
    clock += ms;
  };

  const runtime = createRuntime({
    settings: options.settings ?? testSettings(),
    runner: fake,
    out: output,
    http,
    prompt: prompter,
    sleep,
    kubectl: { now: () => clock },
  });

  return { ...runtime, fake, output, http, prompter, sleeps };
}
