import 'reflect-metadata';
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AuthService } from '../auth/auth.service';
import { getArgValue } from './cli-args';
import { CliModule } from './cli.module';

const USAGE = 'Usage: npm run magic-link:generate -- --email <email> [--base-url <url>]';

async function main() {
  const argv = process.argv.slice(2);
  const email = getArgValue(argv, '--email', '-e');
  const baseUrl = getArgValue(argv, '--base-url', '-b') ?? undefined;
  if (!email) {
    throw new Error(`Missing args. ${USAGE}`);
  }

  const app = await NestFactory.createApplicationContext(CliModule, { logger: ['error', 'warn'] });
  try {
    const link = await app.get(AuthService).issueOperatorMagicLink(email, baseUrl);
    // eslint-disable-next-line no-console
    console.log(
      [
        `Magic link for ${link.user.email} (${link.organization.name})`,
        link.url,
        `Expires at ${link.expiresAt.toISOString()}`,
      ].join('\n'),
    );
  } finally {
    await app.close();
  }
}

main().catch((err: unknown) => {
  new Logger('generate-magic-link').error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
