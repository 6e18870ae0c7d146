import { Inject, Injectable } from '@nestjs/common';
import {
  OpticalTextSource,
  ResolvedTarget,
  ScreenshotSource,
} from '@droidtap/shared';
import { OPTICAL_TEXT_SOURCE, SCREENSHOT_SOURCE } from '../../tokens';
import { ResolutionContext } from '../resolution-context';
import { TierMatcher } from './tier-matcher.interface';

export const FUZZY_TEXT_THRESHOLD = 0.7;

/**
 * Tier 2: text recognition over the cached screenshot, exact first and then
 * fuzzy.
 */
@Injectable()
export class OpticalTextMatcher implements TierMatcher {
  readonly tier = 'optical-text' as const;

  constructor(
    @Inject(OPTICAL_TEXT_SOURCE) private readonly ocr: OpticalTextSource,
    @Inject(SCREENSHOT_SOURCE) private readonly screenshots: ScreenshotSource,
  ) {}

  isEnabled(): boolean {
    return this.ocr.available;
  }

  async attempt(context: ResolutionContext): Promise<ResolvedTarget | null> {
    const query = context.query.searchText;
    const image = await this.screenshots.read();

    const [exact] = await this.ocr.findText(image, query);
    if (exact) {
      return {
        coordinates: { ...exact.center },
        tier: this.tier,
        label: exact.text,
        score: exact.confidence,
      };
    }

    const [fuzzy] = await this.ocr.findTextFuzzy(
      image,
      query,
      FUZZY_TEXT_THRESHOLD,
    );
    if (fuzzy) {
      return {
        coordinates: { ...fuzzy.match.center },
        tier: this.tier,
        label: fuzzy.match.text,
        score: fuzzy.score,
      };
    }
    return null;
  }
}
