export async function createAutomation(): Promise<object> {
	return { close: async () => {} };
}
