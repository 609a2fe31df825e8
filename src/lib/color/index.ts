export { NO_COLOR, formatColor, interpolateColor, parseColor, rgba } from './color';
