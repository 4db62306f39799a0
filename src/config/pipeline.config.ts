import type { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { parseDuration } from './duration';

/** Injection token for the frozen {@link PipelineConfig}. */
export const PIPELINE_CONFIG = Symbol('PIPELINE_CONFIG');

const DurationSchema = z.string().transform((value, ctx) => {
  try {
    return parseDuration(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : String(error),
    });
    return z.NEVER;
  }
});

const IntegerSchema = z.coerce.number().int();

export const KeywordsSchema = z
  .array(z.string())
  .transform(raw => [
    ...new Set(raw.map(k => k.trim().toLowerCase()).filter(k => k.length > 0)),
  ])
  .refine(keywords => keywords.length > 0, {
    message: 'At least one keyword is required (KEYWORDS)',
  });

export const PipelineConfigSchema = z.object({
  keywords: KeywordsSchema,
  messageTemplate: z
    .string({ required_error: 'DM_MESSAGE is required' })
    .min(1, 'DM_MESSAGE is required'),
  preSendDelayMs: DurationSchema,
  maxRetries: IntegerSchema.min(0),
  backoffBaseMs: DurationSchema,
  queueCapacity: IntegerSchema.min(1),
  dispatchTimeoutMs: DurationSchema,
  skipTerminalRetries: z.boolean(),
  verifyToken: z
    .string({ required_error: 'VERIFY_TOKEN is required' })
    .min(1, 'VERIFY_TOKEN is required'),
  accessToken: z
    .string({ required_error: 'ACCESS_TOKEN is required' })
    .min(1, 'ACCESS_TOKEN is required'),
  businessId: z
    .string({ required_error: 'IG_BUSINESS_ID is required' })
    .min(1, 'IG_BUSINESS_ID is required'),
  graphApiUrl: z
    .string()
    .url()
    .transform(url => url.replace(/\/+$/, '')),
});

/**
 * Process-wide pipeline settings. Read once at startup, frozen afterwards.
 */
export type PipelineConfig = Readonly<
  Omit<z.output<typeof PipelineConfigSchema>, 'keywords'> & {
    keywords: readonly string[];
  }
>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

/**
 * Validates raw settings and returns a frozen {@link PipelineConfig}.
 *
 * @throws Error listing every invalid setting
 */
export function buildPipelineConfig(input: unknown): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid pipeline configuration: ${problems}`);
  }
  return Object.freeze({
    ...result.data,
    keywords: Object.freeze([...result.data.keywords]),
  });
}

/**
 * Provider factory: maps the `pipeline` and `instagram` config sections onto
 * the schema's flat shape.
 */
export function pipelineConfigFactory(
  configService: ConfigService,
): PipelineConfig {
  return buildPipelineConfig({
    keywords: configService.get<string[]>('pipeline.keywords'),
    messageTemplate: configService.get<string>('pipeline.messageTemplate'),
    preSendDelayMs: configService.get<string>('pipeline.preSendDelay'),
    maxRetries: configService.get<string>('pipeline.maxRetries'),
    backoffBaseMs: configService.get<string>('pipeline.backoffBase'),
    queueCapacity: configService.get<string>('pipeline.queueCapacity'),
    dispatchTimeoutMs: configService.get<string>('pipeline.dispatchTimeout'),
    skipTerminalRetries: configService.get<boolean>(
      'pipeline.skipTerminalRetries',
    ),
    verifyToken: configService.get<string>('instagram.verifyToken'),
    accessToken: configService.get<string>('instagram.accessToken'),
    businessId: configService.get<string>('instagram.businessId'),
    graphApiUrl: configService.get<string>('instagram.graphApiUrl'),
  });
}
