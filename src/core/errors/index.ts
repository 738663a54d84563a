export { MeasureError, ErrorCode, isMeasureError, unsupported } from './MeasureError';
