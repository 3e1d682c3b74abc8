// Path: src/lib/ignition/index.ts
// Public API for Ignition inspection

export {
  loadIgnitionConfig,
  listFiles,
  listDropins,
  formatSection,
} from './inspector.js';
