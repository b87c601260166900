/**
 * Core types for the credential provisioner
 */

export * from './provisioning.js';
