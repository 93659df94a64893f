import { parseArgs } from 'util';
import { config } from './env.config';

export interface UploaderArgs {
  user?: string;
  password?: string;
  output: string;
  once: boolean;
}

export const parseUploaderArgs = (argv: string[], env: NodeJS.ProcessEnv = process.env): UploaderArgs => {
  const { values } = parseArgs({
    args: argv,
    options: {
      user: { type: 'string' },
      password: { type: 'string', short: 'p' },
      output: { type: 'string', short: 'o' },
      once: { type: 'boolean' },
    },
  });

  return {
    user: values.user ?? (env.DEVICE_SERIAL || undefined),
    password: values.password ?? (env.DEVICE_PASSWORD || undefined),
    output: values.output ?? config.outputDir,
    once: values.once ?? false,
  };
};
