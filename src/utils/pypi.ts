/**
 * Checks whether a package name is already taken on PyPI
 */
export async function existsOnPypi(packageName: string): Promise<boolean> {
	try {
		const name = encodeURIComponent(packageName);
		const response = await fetch(`https://pypi.org/pypi/${name}/json`);
		return response.ok;
	} catch {
		// Offline: the name can't be checked, so don't warn about it
		return false;
	}
}
