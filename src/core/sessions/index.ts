export { SessionFilterStore } from './session-filter-store';
export { UserDirectory } from './user-directory';
