import { defineConfig } from 'vite'

export default defineConfig({
  optimizeDeps: {
    exclude: [
      '@mvu-forms/dom',
      '@mvu-forms/errors',
      '@mvu-forms/fields',
      '@mvu-forms/forms',
      '@mvu-forms/store',
    ],
  },
})
