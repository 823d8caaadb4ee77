// Jest setup file for global test configuration

jest.setTimeout(10000);

process.on('unhandledRejection', (reason, promise) => {
  console.warn('Unhandled Rejection at:', promise, 'reason:', reason);
});
