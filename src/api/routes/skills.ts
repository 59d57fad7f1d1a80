import type { FastifyInstance } from 'fastify';
import { isSkillCategory, type SkillDefinition } from '../../skills/types.js';
import type { RouteOpts } from '../types.js';

/** Listing form: everything except where the definition was loaded from. */
function summary(def: SkillDefinition) {
  return {
    name: def.name,
    category: def.category,
    description: def.description,
    kind: def.strategy.kind,
    parameters: def.parameters,
    tags: def.tags,
    aliases: def.aliases,
    examples: def.examples,
  };
}

export async function registerSkillRoutes(fastify: FastifyInstance, opts: RouteOpts) {
  fastify.get<{ Querystring: { category?: string; tag?: string } }>('/v1/skills', async (req, reply) => {
    const { category, tag } = req.query;
    let skills = opts.registry.list();
    if (category !== undefined) {
      if (!isSkillCategory(category)) {
        return reply.status(400).send({ error: `Unknown category: ${category}` });
      }
      skills = opts.registry.listByCategory(category);
    }
    if (tag !== undefined) {
      const tagged = new Set(opts.registry.listByTag(tag).map((s) => s.name));
      skills = skills.filter((s) => tagged.has(s.name));
    }
    return { skills: skills.map(summary), count: skills.length };
  });

  fastify.get<{ Querystring: { q?: string } }>('/v1/skills/search', async (req, reply) => {
    const q = req.query.q?.trim();
    if (!q) return reply.status(400).send({ error: 'q is required' });
    const skills = opts.registry.search(q);
    return { query: q, skills: skills.map(summary), count: skills.length };
  });

  fastify.get<{ Params: { name: string } }>('/v1/skills/:name', async (req, reply) => {
    const def = opts.registry.get(req.params.name);
    if (!def) return reply.status(404).send({ error: `Skill not found: ${req.params.name}` });
    return summary(def);
  });

  fastify.get('/v1/catalog', async (_req, reply) => {
    reply.header('Content-Type', 'text/markdown; charset=utf-8');
    return opts.registry.toCatalogText();
  });

  fastify.get('/v1/schema', async () => opts.registry.toSchema());
}
