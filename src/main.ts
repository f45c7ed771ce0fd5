import 'reflect-metadata';
import { spawn } from 'child_process';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { APP_CONFIG } from './config/stick-list.config';

async function bootstrap(): Promise<void> {
  // Create Nest application with structured logging enabled.
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug'],
  });

  // Multipart option fields are validated and coerced through the DTO.
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidUnknownValues: false,
    }),
  );

  const port = APP_CONFIG.port;
  await app.listen(port);

  const logger = new Logger('Bootstrap');
  const uploadUiUrl = `http://localhost:${port}/stick-list/upload-ui`;
  logger.log(`Stick list transformer running on port ${port}`);
  logger.log(`Upload UI: ${uploadUiUrl}`);

  if (APP_CONFIG.openUiOnStart) {
    openInBrowser(uploadUiUrl, logger);
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exitCode = 1;
});

function openInBrowser(url: string, logger: Logger): void {
  try {
    const child =
      process.platform === 'win32'
        ? spawn('cmd', ['/c', 'start', '', url], { detached: true, stdio: 'ignore' })
        : spawn(process.platform === 'darwin' ? 'open' : 'xdg-open', [url], {
            detached: true,
            stdio: 'ignore',
          });

    child.on('error', (error) => {
      logger.warn(`Could not auto-open browser. Open manually: ${url}. Error: ${error.message}`);
    });
    child.unref();
    logger.log('Opened upload UI in default browser');
  } catch (error: unknown) {
    logger.warn(
      `Could not auto-open browser. Open manually: ${url}. Error: ${
        error instanceof Error ? error.message : String(error)
      }`,
    );
  }
}
