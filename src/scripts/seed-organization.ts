import 'reflect-metadata';
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { OrganizationType } from '../organization/model/organization.model';
import { OrganizationService } from '../organization/organization.service';
import { getArgValue } from './cli-args';
import { CliModule } from './cli.module';

const USAGE =
  'Usage: npm run organization:seed -- --name <name> --email <admin-email> [--type company|supplier] [--slug <slug>]';

const parseType = (raw: string | null): OrganizationType => {
  if (raw === null) return OrganizationType.COMPANY;
  const type = Object.values(OrganizationType).find((value) => value === raw.toLowerCase());
  if (!type) {
    throw new Error(`Unknown organization type "${raw}". ${USAGE}`);
  }
  return type;
};

async function main() {
  const argv = process.argv.slice(2);
  const name = getArgValue(argv, '--name', '-n');
  const adminEmail = getArgValue(argv, '--email', '-e');
  if (!name || !adminEmail) {
    throw new Error(`Missing args. ${USAGE}`);
  }
  const type = parseType(getArgValue(argv, '--type', '-t'));
  const slug = getArgValue(argv, '--slug', '-s') ?? undefined;

  const app = await NestFactory.createApplicationContext(CliModule, { logger: ['error', 'warn'] });
  try {
    const { organization, admin } = await app.get(OrganizationService).createWithAdmin({
      name,
      type,
      adminEmail,
      slug,
    });
    // eslint-disable-next-line no-console
    console.log(`Created ${organization.type} "${organization.name}" (${organization.slug}) with admin ${admin.email}`);
  } finally {
    await app.close();
  }
}

main().catch((err: unknown) => {
  new Logger('seed-organization').error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
