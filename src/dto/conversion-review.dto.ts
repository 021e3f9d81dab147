import { z } from 'zod';

export const CONVERSION_REVIEW_API_VERSION = 'apiextensions.k8s.io/v1';
export const CONVERSION_REVIEW_KIND = 'ConversionReview';

export const conversionReviewSchema = z.object({
  apiVersion: z.literal(CONVERSION_REVIEW_API_VERSION),
  kind: z.literal(CONVERSION_REVIEW_KIND),
  request: z.object({
    uid: z.string().min(1),
    desiredAPIVersion: z.string().min(1),
    objects: z.array(z.unknown()).default([]),
  }),
});

export type ConversionReviewDto = z.infer<typeof conversionReviewSchema>;
export type ConversionRequest = ConversionReviewDto['request'];

export type ConversionResult = { status: 'Success' } | { status: 'Failure'; message: string };

export interface ConversionResponse {
  uid: string;
  convertedObjects: unknown[];
  result: ConversionResult;
}

export interface ConversionReviewResponse {
  apiVersion: typeof CONVERSION_REVIEW_API_VERSION;
  kind: typeof CONVERSION_REVIEW_KIND;
  response: ConversionResponse;
}
