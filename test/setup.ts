// Keep test output to errors only; individual tests pass their own Logger options
process.env.LOG_LEVEL = 'error'
