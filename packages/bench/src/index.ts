export * from './config.js'
export * from './driver.js'
export * from './pool.js'
export * from './stats.js'
export * from './report.js'
export * from './health.js'
export * from './benchmark.js'
