import { Injectable } from '@nestjs/common';

import type { IClock } from '../interfaces/clock.interface';

@Injectable()
export class SystemClock implements IClock {
  now(): Date {
    return new Date();
  }
}
