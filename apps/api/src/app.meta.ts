import { DEFAULT_APP_VERSION } from './app.constants';

export type AppMeta = {
  version: string;
};

export function readAppMeta(env: Record<string, string | undefined> = process.env): AppMeta {
  return {
    version: (env.APP_VERSION ?? '').trim() || DEFAULT_APP_VERSION,
  };
}
