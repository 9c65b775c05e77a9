// Global test setup for the supervisor

jest.setTimeout(10000);

// Keep configuration tests independent of the developer's shell
for (const key of Object.keys(process.env)) {
  if (key.startsWith('SUPERVISOR_')) {
    delete process.env[key];
  }
}
