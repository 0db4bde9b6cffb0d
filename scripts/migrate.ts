async function main(): Promise<void> {
  process.env.DATABASE_URL = process.env.DATABASE_URL ?? 'postgresql://localhost:5432/observatory';
  process.env.PERSISTENCE_DRIVER = 'postgres';
  process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'info';

  const { closeDb, logger, runMigrations } = await import('@observatory/shared');

  logger.info('Starting migrations');
  await runMigrations();
  logger.info('Migrations finished');
  await closeDb();
}

main().catch(async (error: unknown) => {
  const { logger } = await import('@observatory/shared');
  logger.error({ err: error }, 'Migration runner failed');
  process.exit(1);
});
