import { z } from 'zod';

export const ParamValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const StringList = z
  .union([z.string(), z.array(z.string())])
  .transform((v) => (Array.isArray(v) ? v : [v]));

// ── Skill definition files ────────────────────────────────────────────

export const ParameterYamlSchema = z
  .object({
    type: z.string().default('string'),
    description: z.string().default(''),
    required: z.boolean().default(false),
    default: ParamValueSchema.optional(),
    min: z.number().optional(),
    max: z.number().optional(),
    choices: z.array(z.union([z.string(), z.number()]).transform(String)).optional(),
    aliases: StringList.optional(),
  })
  .strict();

export const SkillCallYamlSchema = z.union([
  z.string().min(1).transform((skill) => ({ skill, params: {} })),
  z
    .object({
      skill: z.string().min(1),
      params: z.record(ParamValueSchema).default({}),
    })
    .strict(),
]);

export const SkillYamlSchema = z
  .object({
    name: z.string().regex(/^[a-z][a-z0-9_]*$/, 'skill names are lower_snake_case'),
    category: z.string().default('custom'),
    description: z.string().default(''),
    parameters: z.record(ParameterYamlSchema).default({}),
    template: z.string().min(1).optional(),
    pipeline: z.array(SkillCallYamlSchema).min(1).optional(),
    handler: z.string().min(1).optional(),
    option: z.boolean().optional(),
    stream: z.enum(['video', 'audio']).optional(),
    tags: StringList.default([]),
    examples: StringList.default([]),
    aliases: StringList.default([]),
  })
  .strict()
  .refine(
    (s) => [s.template, s.pipeline, s.handler].filter((v) => v !== undefined).length === 1,
    { message: 'exactly one of template, pipeline or handler is required' },
  );

export type SkillYaml = z.infer<typeof SkillYamlSchema>;

export const SkillFileSchema = z.union([
  z.object({ skills: z.array(z.unknown()) }).transform((f) => f.skills),
  z.array(z.unknown()),
  z.record(z.unknown()).transform((one) => [one]),
]);

export const PackYamlSchema = z.object({
  name: z.string().min(1),
  version: z.string().optional(),
  description: z.string().optional(),
});

// ── Pipeline IR ───────────────────────────────────────────────────────

export const PipelineStepSchema = z.object({
  skill: z.string().min(1),
  params: z.record(z.unknown()).default({}),
});

export const PipelineContextSchema = z
  .object({
    input: z.string().min(1),
    output: z.string().min(1),
    extra_inputs: z.array(z.string().min(1)).default([]),
    extra_input_kinds: z.array(z.enum(['video', 'image', 'audio'])).optional(),
    extra_durations: z.array(z.number().nonnegative()).optional(),
    duration: z.number().nonnegative().optional(),
    fps: z.number().positive().optional(),
    width: z.number().int().positive().optional(),
    height: z.number().int().positive().optional(),
    has_audio: z.boolean().optional(),
    text_inputs: z.array(z.string()).default([]),
    overwrite: z.boolean().optional(),
  })
  .refine((c) => !c.extra_input_kinds || c.extra_input_kinds.length === c.extra_inputs.length, {
    message: 'extra_input_kinds must have the same length as extra_inputs',
    path: ['extra_input_kinds'],
  })
  .refine((c) => !c.extra_durations || c.extra_durations.length === c.extra_inputs.length, {
    message: 'extra_durations must have the same length as extra_inputs',
    path: ['extra_durations'],
  });

export const PipelineRequestSchema = z.object({
  steps: z.array(PipelineStepSchema),
  context: PipelineContextSchema,
});

export type PipelineRequest = z.infer<typeof PipelineRequestSchema>;
export type PipelineContextInput = z.infer<typeof PipelineContextSchema>;

// ── Project configuration ─────────────────────────────────────────────

export const ProjectConfigSchema = z
  .object({
    skill_dirs: z.array(z.string()).default([]),
    log_level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    defaults: z
      .object({
        fps: z.number().positive().default(25),
        width: z.number().int().positive().default(1920),
        height: z.number().int().positive().default(1080),
        still_duration: z.number().positive().default(4),
      })
      .default({}),
    api: z
      .object({
        host: z.string().default('127.0.0.1'),
        port: z.number().int().min(1).max(65535).default(7900),
      })
      .default({}),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

// ── Text side channel ─────────────────────────────────────────────────

export const TEXT_MODES = ['overlay', 'watermark', 'title_card', 'auto'] as const;

export const TextEnvelopeSchema = z.object({
  text: z.string().default(''),
  mode: z.enum(TEXT_MODES),
  font_size: z.number().positive().optional(),
  font_color: z.string().optional(),
  position: z.string().optional(),
  start_time: z.number().optional(),
  end_time: z.number().optional(),
});

export type TextEnvelope = z.infer<typeof TextEnvelopeSchema>;
