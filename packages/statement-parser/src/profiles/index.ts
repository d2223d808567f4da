export { InstitutionProfile } from './institution-profile.js';
export type { InstitutionProfileInit, FieldExtractors } from './institution-profile.js';
export { loadProfileTable, parseProfileTable, getProfileTablePath, PROFILE_DIR } from './loader.js';
