import { FileUtils } from './io/file';
import { AtomicFileWriter } from './io/atomic-writer';
import { logger } from './cli/logger';
import { display } from './cli/display';

export { FileUtils, AtomicFileWriter, logger, display };
