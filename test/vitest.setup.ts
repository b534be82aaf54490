const setIfMissing = (key: string, value: string) => {
  if (!process.env[key]) {
    process.env[key] = value;
  }
};

setIfMissing('NODE_ENV', 'test');
// Keep expected warnings out of the test output
setIfMissing('HOOKD_LOG_LEVEL', 'ERROR');
// Tests never write to a developer's relay log
delete process.env.HOOKD_LOG_FILE;
