import { runCli } from './program';

process.exit(await runCli(process.argv));
