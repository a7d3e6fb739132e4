import path from 'path';
import { fileURLToPath } from 'url';

import { build } from 'esbuild';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { getLogger } from '@kernel/logger';
import { toError } from '@errors';
import { errors } from '@errors/responses';

const logger = getLogger('asset-routes');

const ROOT_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../..');
const CLIENT_DIR = path.join(ROOT_DIR, 'apps/web/client');

/** Browser entry points served under /static/js/<name>.js */
export const CLIENT_BUNDLES = ['index', 'result'] as const;
export type ClientBundle = typeof CLIENT_BUNDLES[number];

const BundleParamsSchema = z.object({
  bundle: z.enum(CLIENT_BUNDLES),
});

export interface AssetRouteOptions {
  /** Minify and cache bundles for the life of the process */
  production: boolean;
}

/**
* Bundle one client entry point from its TypeScript source
*/
export async function bundleClientScript(name: ClientBundle, minify: boolean): Promise<string> {
  const result = await build({
    entryPoints: [path.join(CLIENT_DIR, `${name}.ts`)],
    bundle: true,
    write: false,
    format: 'iife',
    platform: 'browser',
    target: 'es2020',
    minify,
    sourcemap: minify ? false : 'inline',
    tsconfig: path.join(ROOT_DIR, 'tsconfig.json'),
    logLevel: 'silent',
  });
  const output = result.outputFiles[0];
  if (!output) {
    throw new Error(`esbuild produced no output for ${name}`);
  }
  return output.text;
}

export async function assetRoutes(app: FastifyInstance, options: AssetRouteOptions): Promise<void> {
  const cache = new Map<ClientBundle, Promise<string>>();

  function getBundle(name: ClientBundle): Promise<string> {
    if (!options.production) {
      return bundleClientScript(name, false);
    }
    let pending = cache.get(name);
    if (!pending) {
      pending = bundleClientScript(name, true);
      // A failed build is retried on the next request
      void pending.catch(() => cache.delete(name));
      cache.set(name, pending);
    }
    return pending;
  }

  app.get('/static/js/:bundle.js', async (req, reply) => {
    const params = BundleParamsSchema.safeParse(req.params);
    if (!params.success) {
      return errors.notFound(reply, 'Script');
    }

    try {
      const code = await getBundle(params.data.bundle);
      return reply
        .type('application/javascript; charset=utf-8')
        .header('Cache-Control', options.production ? 'public, max-age=3600' : 'no-cache')
        .send(code);
    } catch (error: unknown) {
      logger.error('Client bundle failed', toError(error), { bundle: params.data.bundle });
      return errors.internal(reply, 'Failed to build script');
    }
  });
}
