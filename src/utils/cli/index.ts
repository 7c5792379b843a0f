import { formatHelp, displayError } from './cli-display';
import { display } from './display';
import { logger } from './logger';
import { readPackageInfo } from './package-info';

export { formatHelp, displayError, display, logger, readPackageInfo };
