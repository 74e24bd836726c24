export { verifyLesson, formatReport } from './verify.js';
export type { CheckKind, CheckResult, VerificationReport } from './verify.js';
