export { plan } from './plan.js'
export type { PlanOptions } from './plan.js'
export { install } from './install.js'
export type { InstallOptions } from './install.js'
export { uninstall } from './uninstall.js'
export type { UninstallOptions } from './uninstall.js'
