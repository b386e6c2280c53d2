export { withDeadline, DeadlineExceededError } from './deadline.js';
