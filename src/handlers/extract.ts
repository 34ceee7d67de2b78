import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import type { MetadataService } from '../services/metadata.js';
import type { ExtractionResult } from '../types/index.js';
import { InvalidRequestError } from '../utils/errors.js';

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

const booleanFlag = (name: string) =>
  z
    .string({ invalid_type_error: `${name} must be a single boolean value` })
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') return false;
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.has(normalized)) return true;
      if (FALSE_VALUES.has(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be a boolean` });
      return z.NEVER;
    });

export const extractQuerySchema = z.object({
  video_url: z
    .string({ required_error: 'video_url is required', invalid_type_error: 'video_url must be a single string' })
    .trim()
    .min(1, 'video_url must not be empty'),
  no_watermark: booleanFlag('no_watermark'),
  refresh_cookies: booleanFlag('refresh_cookies'),
});

export type ExtractQuery = z.infer<typeof extractQuerySchema>;

export const parseExtractQuery = (query: unknown): ExtractQuery => {
  const parsed = extractQuerySchema.safeParse(query);
  if (!parsed.success) {
    throw new InvalidRequestError(parsed.error.issues[0]?.message ?? 'Invalid query parameters');
  }
  return parsed.data;
};

/**
 * GET /extract/ — resolves `video_url` into metadata and formats.
 */
export const createExtractHandler =
  (service: MetadataService) =>
  async (req: Request, res: Response<ExtractionResult>, next: NextFunction): Promise<void> => {
    try {
      const query = parseExtractQuery(req.query);
      const result = await service.extract({
        videoUrl: query.video_url,
        noWatermark: query.no_watermark,
        refreshCookies: query.refresh_cookies,
      });
      res.json(result);
    } catch (error) {
      next(error);
    }
  };
