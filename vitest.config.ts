import { defineConfig as defineBaseConfig } from '@magtoc/vitest-config';
import { defineConfig } from 'vitest/config';

export default defineConfig(
  defineBaseConfig({}, { sourceDir: '{apps,packages,tools}/*/src' }),
);
