/** Schema version stamped on serialized errors and audit reports. */
export const GFARCH_REPORT_SCHEMA_VERSION = '1';
