// replaced by vite `define` at build time
declare const __I18N_DEBUG__: boolean
