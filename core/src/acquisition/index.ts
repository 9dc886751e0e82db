export { parseJcampParameters, toParameterValues, coerceJcampValue } from './jcamp.js';
export type { JcampParameters, JcampValue } from './jcamp.js';
export { parseVariableDelayList, delayListValues } from './vdlist.js';
export { groupDelay, supportedFirmwareVersions, acquisitionFunctions } from './group-delay.js';
export { loadAcquisitionFile, loadVariableDelayList } from './files.js';
