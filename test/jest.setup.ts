// Increase timeout for all tests
jest.setTimeout(10000);

// Silence info and warning output during tests; set DEBUG=1 to see it
beforeAll(() => {
  const originalConsoleLog = console.log;
  const originalConsoleWarn = console.warn;

  global.console.log = (...args: unknown[]) => {
    if (process.env.DEBUG) {
      originalConsoleLog(...args);
    }
  };

  global.console.warn = (...args: unknown[]) => {
    if (process.env.DEBUG) {
      originalConsoleWarn(...args);
    }
  };
});
