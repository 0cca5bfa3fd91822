export * from "./AppFactory";
export * from "./config/Config";
export * from "./core/Database";
export * from "./core/MemoryDatabase";
export * from "./errors/OrgSyncErrors";
export * from "./hierarchy/DepartmentGraph";
export type { Department } from "./model/Department";
export type { DepartmentAccessScope } from "./model/DepartmentAccessScope";
export type { OrgChartSyncLog } from "./model/OrgChartSyncLog";
export type { OrgUser } from "./model/OrgUser";
export type { Role } from "./model/Role";
export type { UserDepartment } from "./model/UserDepartment";
export * from "./schemas/OrgChartSchemas";
export * from "./services/AccessControlService";
export * from "./services/OrganizationSyncService";
export * from "./util/Sequelize";
