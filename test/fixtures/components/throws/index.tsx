import type { ComponentProps } from '../../../../src/types/index.js';

export default function Broken({ data }: ComponentProps) {
  throw new Error(`cannot render ${data.brand.name}`);
}
