export { CARE_NOTIFY, NotifyEventKindSchema, CareNotifyPayload, type CareNotify } from './notify';
export { CARE_AUDIT, CareAuditPayload, resourceTypeOf, type CareAudit } from './audit';
