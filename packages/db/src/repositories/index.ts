export * from './certificateRepository.js'
export * from './inMemory.js'
export * from './mappers.js'
export * from './pskRepository.js'
