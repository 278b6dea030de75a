jest.setTimeout(10000);

afterEach(() => {
    // Clear all mocks and timers after each test
    jest.clearAllMocks();
    jest.clearAllTimers();
    jest.useRealTimers();
});
