import { ignoreCommand } from './ignore/ignore';

export { ignoreCommand };
