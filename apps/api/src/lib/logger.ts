/**
 * API Logger
 * 
 * Child of the shared pino logger, tagged with the API component.
 */

import { createLogger } from '@clipset/utils';

export const logger = createLogger({ component: 'api' });
