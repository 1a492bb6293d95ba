// Keep pino quiet in test runs
process.env.LOG_LEVEL = "silent";
