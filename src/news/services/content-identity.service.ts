import { Injectable } from '@nestjs/common';
import { createHash } from 'node:crypto';
import { FINGERPRINT_BODY_CHARS } from '../config/news.constants';

@Injectable()
export class ContentIdentityService {
  /**
   * SHA-256 hex digest of the title and the first FINGERPRINT_BODY_CHARS
   * characters of the body. Both must already be normalized: normalizing
   * twice can strip text that decoded into markup. Feed-provided ids and
   * links are left out.
   */
  fingerprint(title: string, body: string): string {
    const bodyPrefix = body.slice(0, FINGERPRINT_BODY_CHARS);
    return createHash('sha256')
      .update(`${title}\n${bodyPrefix}`, 'utf8')
      .digest('hex');
  }
}
