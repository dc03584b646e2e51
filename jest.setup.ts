// Keep test output quiet; individual tests turn logging back on when they assert on it.
process.env.EXPO_PUBLIC_LOCAL_AUTH_LOGGING = 'false';
