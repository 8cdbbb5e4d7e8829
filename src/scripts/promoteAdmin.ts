import { loadSettings } from '../config';
import { buildContainer } from '../container';

// Usage: npm run promote-admin -- <email>
async function main(email: string | undefined) {
  if (!email) {
    throw new Error('usage: promote-admin <email>');
  }

  const container = buildContainer(loadSettings());
  try {
    const record = await container.users.findByEmail(email);
    if (!record) throw new Error(`no user with email ${email}`);

    await container.users.updateFlags(record.id, { isAdmin: true });
    container.logger.info(`user ${record.id} (${record.username}) is now an admin`);
  } finally {
    container.close();
  }
}

main(process.argv[2]).catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : e);
  process.exit(1);
});
