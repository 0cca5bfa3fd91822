export type { NewOrganization, Organization, OrganizationPlan } from "./tenant/Organization";
export * from "./types/OrgChart";
export * from "./types/RoleLevel";
export * from "./util/LoggerCommon";
