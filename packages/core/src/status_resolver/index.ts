export { resolveSubmissionStatus } from './status_resolver';
