import { Injectable, Logger } from '@nestjs/common';
import { convertTenant } from '../conversion/schema-converter.js';
import { isRecord } from '../conversion/tenant-schemas.js';
import {
  CONVERSION_REVIEW_API_VERSION,
  CONVERSION_REVIEW_KIND,
  type ConversionRequest,
  type ConversionResponse,
  type ConversionReviewResponse,
} from '../dto/conversion-review.dto.js';
import { ConversionError } from '../errors/conversion.error.js';
import { LEGACY_API_VERSION, TENANT_API_VERSION, TENANT_KIND } from '../types/tenant.js';

const SERVED_VERSIONS: ReadonlySet<string> = new Set([LEGACY_API_VERSION, TENANT_API_VERSION]);

@Injectable()
export class ConversionService {
  private readonly logger = new Logger(ConversionService.name);

  /**
   * Converts every object of the request. One failure fails the whole
   * review, so the API server rejects the operation instead of storing a
   * partially converted list.
   */
  review(request: ConversionRequest): ConversionReviewResponse {
    return {
      apiVersion: CONVERSION_REVIEW_API_VERSION,
      kind: CONVERSION_REVIEW_KIND,
      response: this.convert(request),
    };
  }

  private convert(request: ConversionRequest): ConversionResponse {
    const { uid, desiredAPIVersion, objects } = request;

    try {
      const convertedObjects = objects.map((object) => this.convertObject(object, desiredAPIVersion));
      this.logger.debug(
        `Converted ${String(convertedObjects.length)} object(s) to ${desiredAPIVersion} (review ${uid})`,
      );
      return { uid, convertedObjects, result: { status: 'Success' } };
    } catch (error: unknown) {
      if (error instanceof ConversionError) {
        this.logger.warn(`Conversion to ${desiredAPIVersion} failed (review ${uid}): ${error.message}`);
        return { uid, convertedObjects: [], result: { status: 'Failure', message: error.message } };
      }
      throw error;
    }
  }

  // Tenants already at the desired served version go back exactly as received.
  private convertObject(object: unknown, desiredAPIVersion: string): unknown {
    if (
      SERVED_VERSIONS.has(desiredAPIVersion) &&
      isRecord(object) &&
      object['kind'] === TENANT_KIND &&
      object['apiVersion'] === desiredAPIVersion
    ) {
      return object;
    }
    return convertTenant(object, desiredAPIVersion);
  }
}
