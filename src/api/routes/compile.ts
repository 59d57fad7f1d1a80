import type { FastifyInstance } from 'fastify';
import { toArgv, toShellString } from '../../runtime/emitter.js';
import { ValidationError } from '../../shared/errors.js';
import { PipelineRequestSchema, type PipelineRequest } from '../../shared/schemas.js';
import type { RouteOpts } from '../types.js';

function parseRequest(body: unknown): PipelineRequest {
  const parsed = PipelineRequestSchema.safeParse(body);
  if (parsed.success) return parsed.data;
  const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(body)'}: ${i.message}`);
  throw new ValidationError('Invalid pipeline request', { hint: 'expected {steps: [{skill, params}], context: {input, output, ...}}' }, issues);
}

export async function registerCompileRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.post(
    '/v1/compile',
    { config: { rateLimit: { max: 120, timeWindow: '1 minute' } } },
    async (req) => {
      const request = parseRequest(req.body);
      const descriptor = opts.composer.compile(request);
      return {
        argv: toArgv(descriptor),
        command: toShellString(descriptor),
        descriptor,
        warnings: descriptor.warnings,
      };
    },
  );

  fastify.post(
    '/v1/validate',
    { config: { rateLimit: { max: 120, timeWindow: '1 minute' } } },
    async (req) => {
      const parsed = PipelineRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return {
          valid: false,
          issues: parsed.error.issues.map((i) => `${i.path.join('.') || '(body)'}: ${i.message}`),
        };
      }
      return opts.composer.validate(parsed.data);
    },
  );
}
