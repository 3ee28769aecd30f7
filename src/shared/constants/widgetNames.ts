/**
 * Widget names of common core and WAS node types, in widgets_values order.
 *
 * Older editor exports list only the linked inputs of a node and keep the
 * widget values as an anonymous array; these names let the converter map
 * those values back onto named inputs. Types not listed fall back to param_N.
 */

export const KNOWN_WIDGET_NAMES: ReadonlyMap<string, readonly string[]> = new Map<string, readonly string[]>([
  ['CLIPTextEncode', ['text']],
  ['SaveImage', ['filename_prefix']],
  ['PreviewImage', []],
  ['EmptyLatentImage', ['width', 'height', 'batch_size']],
  ['CheckpointLoaderSimple', ['ckpt_name']],
  ['KSampler', ['seed', 'steps', 'cfg', 'sampler_name', 'scheduler', 'denoise']],
  ['Text String', ['text', 'text_b', 'text_c', 'text_d']],
  ['Image Save', ['output_path', 'filename_prefix', 'filename_delimiter', 'filename_number_padding']],
])

/**
 * Values the editor stores after a seed widget for its "control after
 * generate" dropdown. The backend does not accept them as inputs.
 */
export const CONTROL_AFTER_GENERATE_VALUES: ReadonlySet<string> = new Set([
  'fixed',
  'increment',
  'decrement',
  'randomize',
])

export const SEED_WIDGET_NAMES: ReadonlySet<string> = new Set(['seed', 'noise_seed'])
