// Keep debug logging off unless a test turns it on explicitly.
delete process.env.MARKERSPAN_DEBUG;
Reflect.deleteProperty(globalThis, '__MARKERSPAN_DEBUG');
