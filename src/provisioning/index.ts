export { Provisioner } from './Provisioner.js';
export type { CleanupOptions, LessonConnection, ProvisionerOptions, SetupOptions } from './Provisioner.js';
export { renderCompose, renderPostgresConf, writeArtifacts } from './artifacts.js';
