import { DEFAULT_CONFIG_PATH } from '../src/config';

/** `--config <path>` wins over RAG_CONFIG, which wins over the default path. */
export function configPathFromArgs(args: string[]): string {
  const flag = args.indexOf('--config');
  const fromFlag = flag >= 0 ? args[flag + 1] : undefined;
  return fromFlag ?? process.env.RAG_CONFIG ?? DEFAULT_CONFIG_PATH;
}
