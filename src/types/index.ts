export { Result } from './result';

export { validateIsoDate } from './validation';
