import { createAccessToken, type CallerRole } from '../src/lib/auth';

const usage = 'Usage: npm run token -- <callerId> [ADMIN|USER] [displayName]';

const main = () => {
  const [callerId, roleArg, displayName] = process.argv.slice(2);
  if (!callerId || callerId.trim().length === 0) {
    // eslint-disable-next-line no-console
    console.error(usage);
    process.exit(1);
  }

  const normalizedRole = (roleArg ?? 'USER').trim().toUpperCase();
  if (normalizedRole !== 'ADMIN' && normalizedRole !== 'USER') {
    // eslint-disable-next-line no-console
    console.error(`Unknown role "${roleArg}". ${usage}`);
    process.exit(1);
  }

  const role: CallerRole = normalizedRole;
  const token = createAccessToken({
    sub: callerId.trim(),
    role,
    ...(displayName ? { displayName } : {}),
  });

  // eslint-disable-next-line no-console
  console.log(token);
};

main();
