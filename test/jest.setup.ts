// Silence progress logs during tests
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
