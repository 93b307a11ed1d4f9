export { reconcileMembership, type ReconcileOptions } from './membership-reconciler.js';
