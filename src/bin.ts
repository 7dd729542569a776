import 'dotenv/config';
import { runCli } from './cli';

runCli(process.argv.slice(2))
  .then(({ exitCode }) => {
    process.exitCode = exitCode;
  })
  .catch((err: unknown) => {
    console.error('[cli] Unexpected error', err);
    process.exitCode = 1;
  });
