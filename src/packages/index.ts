export { PackageStore, PackageStatusSchema, PackageStatusesSchema, validatePackageName } from './package-store';
export type { PackageState, PackageStatus, PackageStatuses } from './package-store';
