/**
 * Shared helpers for series index tests
 */

export {
  createTempDir,
  removeDir,
  writeSeriesSource,
  withTempDir,
  withSeriesSource,
} from "./fs.js";
