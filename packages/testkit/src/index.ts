export { createTempDir, removeDir, withTempDir, listDir } from "./fs.js";
export { sleep } from "./timers.js";
export { makeRecord, samplePipeline } from "./fixtures.js";
