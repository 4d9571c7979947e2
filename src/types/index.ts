export * from './resume.types'
export * from './theme.types'
export * from './document.types'
