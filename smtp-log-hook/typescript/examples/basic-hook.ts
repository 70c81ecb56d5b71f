/**
 * Basic Mail Hook Example
 *
 * Registers an authenticated mail hook on a console logger, so every error
 * logged afterwards is also emailed to the on-call address.
 */

import {
  createLogger,
  createMailAuthHook,
  isMailHookError,
  LogLevel,
} from '../src';

async function main() {
  const logger = createLogger(LogLevel.Info);

  try {
    // Fails fast if the server is not listening
    const hook = await createMailAuthHook({
      appName: 'billing',
      host: process.env.SMTP_HOST ?? 'smtp.example.com',
      port: Number(process.env.SMTP_PORT ?? 587),
      from: 'Billing Alerts <alerts@example.com>',
      to: 'oncall@example.com',
      username: process.env.SMTP_USERNAME ?? 'alerts',
      password: process.env.SMTP_PASSWORD ?? '',
      logger: createLogger(LogLevel.Debug),
    });
    logger.addHook(hook);
  } catch (error) {
    if (isMailHookError(error)) {
      console.error(`Mail hook unavailable (${error.kind}): ${error.message}`);
    }
    throw error;
  }

  logger.info('Invoice run started', { batch: 42 });
  logger.error('Invoice run failed', new Error('ledger locked'), { batch: 42 });
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
