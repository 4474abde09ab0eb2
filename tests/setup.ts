// Keep the process-wide logger off the console and out of log files
process.env.LOG_CONSOLE = process.env.LOG_CONSOLE ?? 'false';
delete process.env.LOG_FILE;
