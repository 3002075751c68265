import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { bootstrap, type AppServices } from '@main/bootstrap';
import { APP_NAME } from '@shared/app-info';

function attachUpdatePresenter(services: AppServices): void {
  const { updateManager } = services;

  updateManager.on('updateAvailable', (info) => {
    process.stdout.write(
      `${APP_NAME} v${info.versionMajor}.${info.versionMinor} esta disponivel para download: ${info.downloadUrl}\n`
    );
    if (info.releaseNotes) {
      process.stdout.write(`${info.releaseNotes}\n`);
    }
  });

  updateManager.on('checkFailed', (message) => {
    process.stderr.write(`${message}\n`);
  });
}

function main(argv: string[]): void {
  const services = bootstrap({
    defaultApplicationDir: path.dirname(fileURLToPath(import.meta.url))
  });
  attachUpdatePresenter(services);

  let stopping = false;
  const stop = (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    stopping = true;
    services.logger.info('app.signal', { signal });
    services.shutdown();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  if (argv.includes('--check-now')) {
    services.updateManager.on('noUpdateAvailable', () => {
      process.stdout.write(`${APP_NAME} esta atualizado.\n`);
    });
    services.updateManager.on('checkFinished', () => {
      services.shutdown();
    });
    services.updateManager.triggerImmediateCheck();
  }
}

main(process.argv.slice(2));
