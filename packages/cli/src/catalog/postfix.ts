/**
 * Postfix SMTP relay for testing outgoing mail
 */

import { defineAction, defineService, type ServiceContext } from '@minidev/core';
import { errorMessage } from '../errors';
import { requirePod } from './helpers';

const SELECTOR = 'app=postfix';

const pod = (ctx: ServiceContext) => requirePod(ctx, SELECTOR, 'Postfix');

// Message fields travel as positional shell parameters, never inside the script
const MAIL_SCRIPT = 'printf "%s\\n" "$1" | mail -s "$2" -a "From: $3" "$4"';
const SENDMAIL_SCRIPT = 'printf "Subject: %s\\nFrom: %s\\nTo: %s\\n\\n%s\\n" "$2" "$3" "$4" "$1" | sendmail -v "$4"';

export function mailCommand(script: string, body: string, subject: string, from: string, to: string): string[] {
  return ['sh', '-c', script, 'sh', body, subject, from, to];
}

export const postfix = defineService({
  id: 'postfix',
  name: 'Postfix',
  description: 'SMTP mail server',
  aliases: ['smtp', 'mail'],
  manifest: 'postfix.yaml',
  selector: SELECTOR,
  presence: { kind: 'deployment', name: 'postfix' },
  workloads: [{ kind: 'deployment', name: 'postfix', selector: SELECTOR, timeoutSeconds: 120 }],
  statusSections: [
    { title: 'Deployment Status', get: ['deployment', 'postfix'] },
    { title: 'Pods', pods: SELECTOR },
    { title: 'Service', get: ['service', 'postfix'] },
  ],
  accessPorts: [{ key: 'smtp', service: 'postfix', portName: 'smtp' }],
  describeAccess: ({ ip, ports }) => [
    `  SMTP Server: ${ip}:${ports.smtp}`,
    '  Domain: example.com',
    '  Auth: user:password',
  ],
  actions: [
    defineAction({
      name: 'test',
      aliases: ['send'],
      description: 'Send a test email',
      arguments: [{ name: 'to' }, { name: 'from' }, { name: 'subject' }, { name: 'body' }],
      run: async (
        ctx,
        [
          to = 'test@example.com',
          from = 'sender@example.com',
          subject = 'Test Email',
          body = 'This is a test email from Postfix',
        ]
      ) => {
        const name = await pod(ctx);
        ctx.out.info(`Sending test email to: ${to}`);
        try {
          await ctx.kube.exec(name, ctx.namespace, mailCommand(MAIL_SCRIPT, body, subject, from, to));
        } catch (error) {
          ctx.out.warning(`mail failed (${errorMessage(error)}), falling back to sendmail`);
          await ctx.kube.exec(name, ctx.namespace, mailCommand(SENDMAIL_SCRIPT, body, subject, from, to));
        }
        ctx.out.success('Email sent (check logs for delivery status)');
      },
    }),
    defineAction({
      name: 'queue',
      description: 'Show the mail queue',
      run: async (ctx) => {
        const name = await pod(ctx);
        ctx.out.info('Checking mail queue...');
        await ctx.kube.exec(name, ctx.namespace, ['postqueue', '-p'], { tty: true });
      },
    }),
    defineAction({
      name: 'flush',
      description: 'Flush the mail queue',
      run: async (ctx) => {
        const name = await pod(ctx);
        ctx.out.info('Flushing mail queue...');
        await ctx.kube.exec(name, ctx.namespace, ['postqueue', '-f'], { tty: true });
        ctx.out.success('Mail queue flushed');
      },
    }),
  ],
  examples: [
    'minidev postfix test user@example.com',
    "minidev postfix test user@example.com sender@example.com 'Hello' 'Test message'",
  ],
});
