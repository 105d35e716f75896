export { DEFAULT_DIFF_OPTIONS } from './defaults';
export { loadDiffOptions, mergeDiffOptions, parseColor } from './loader';
export {
  ColorSchema,
  DiffEnvSchema,
  DiffOptionsSchema,
  type DiffOptions,
  type DiffOptionsInput,
  type MarkerColor,
} from './schema';
