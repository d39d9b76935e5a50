import { z } from 'zod/v4';

import { tripFields } from '../tlc-types/trip.ts';

export const tripParser = z.object(tripFields);
