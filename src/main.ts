#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { CommandRunner } from './cli/command-runner';
import { describeError } from './common/errors';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'warn', 'error'],
  });

  // Ctrl-C stops the run at the next state or batch boundary
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('⚠️ Interrupt received, stopping after the current batch');
    controller.abort();
  });

  try {
    const result = await app.get(CommandRunner).run(process.argv.slice(2), controller.signal);
    process.stdout.write(
      (typeof result.output === 'string'
        ? result.output
        : JSON.stringify(result.output, null, 2)) + '\n',
    );
    process.exitCode = result.exitCode;
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`❌ ${describeError(error)}`);
  process.exitCode = 1;
});
