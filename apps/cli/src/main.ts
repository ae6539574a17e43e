import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { checkScaleCorpus, readScaleFile } from '@tunekit/scl';
import { runCli, type CliIo } from './index.js';

export const createNodeIo = (env: NodeJS.ProcessEnv = process.env): CliIo => ({
  loadScale: readScaleFile,
  checkCorpus: checkScaleCorpus,
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  env,
});

export const isCliEntrypointInvocation = (moduleUrl: string, argvPath: string | undefined): boolean =>
  argvPath !== undefined && argvPath !== '' && resolve(fileURLToPath(moduleUrl)) === resolve(argvPath);

if (isCliEntrypointInvocation(import.meta.url, process.argv[1])) {
  process.exitCode = await runCli(process.argv.slice(2), createNodeIo());
}
