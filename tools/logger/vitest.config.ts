import { defineConfig } from '../vitest-config/src';

export default defineConfig();
