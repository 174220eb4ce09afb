import { SetMetadata } from '@nestjs/common';
import { SKIP_RATE_LIMIT_KEY } from '../../core/constants/constant';

export const SkipRateLimit = () => SetMetadata(SKIP_RATE_LIMIT_KEY, true);
