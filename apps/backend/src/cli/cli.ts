import 'reflect-metadata';
import { INestApplicationContext, Logger, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';

export async function createCliContext(
  logLevels: LogLevel[] = ['warn', 'error'],
): Promise<INestApplicationContext> {
  return NestFactory.createApplicationContext(AppModule, { logger: logLevels });
}

/** Runs a command and turns a rejection into exit code 1. */
export function runCli(name: string, command: () => Promise<void>): void {
  command().catch((error: unknown) => {
    new Logger(name).error(
      error instanceof Error ? error.message : String(error),
    );
    process.exitCode = 1;
  });
}
