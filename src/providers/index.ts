export * from './gemini'
export * from './notion'
