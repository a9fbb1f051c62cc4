// ── Barrel Export for all models ──
export {
  ConsultationRequest,
  type IConsultationRequest,
  type IScoringAttributes,
} from './ConsultationRequest.js';
export { TimeSlot, type ITimeSlot } from './TimeSlot.js';
export { Assignment, type IAssignment } from './Assignment.js';
export { WaitlistEntry, type IWaitlistEntry, type IPriorityScore } from './WaitlistEntry.js';
export { Config, type IConfig } from './Config.js';
export { AuditLog, type IAuditLog } from './AuditLog.js';
