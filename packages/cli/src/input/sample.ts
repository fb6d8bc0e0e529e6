import type { ParameterDefinition } from '@pairforge/shared';

/**
 * Display settings used by `--sample`: five parameters, 3–4 values each.
 */
export const SAMPLE_PARAMETERS: readonly ParameterDefinition[] = [
  {
    name: 'Display Mode',
    values: ['Full Graph', 'Text Only', 'Limited-Bandwidth'],
  },
  { name: 'Language', values: ['English', 'French', 'Spanish', 'Turkish'] },
  { name: 'Fonts', values: ['Minimal', 'Standard', 'Document-loaded'] },
  {
    name: 'Color',
    values: ['Monochrome', 'Colormap', '16-bit', 'True Color'],
  },
  { name: 'Screen Size', values: ['Hand-held', 'laptop', 'fullsize'] },
];
