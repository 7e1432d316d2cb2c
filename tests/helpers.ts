/**
 * In-process GitHub stand-in: a fetch that answers every request with a
 * canned response and records what was asked.
 */

export interface RecordedRequest {
	url: string;
	method: string;
	accept: string | null;
	authorization: string | null;
}

export function stubFetch(
	body: string,
	init: { status?: number; contentType?: string } = {},
): { fetch: typeof fetch; requests: RecordedRequest[] } {
	const requests: RecordedRequest[] = [];

	const fakeFetch: typeof fetch = async (input, requestInit) => {
		const headers = new Headers(requestInit?.headers);
		requests.push({
			url: String(input),
			method: requestInit?.method ?? "GET",
			accept: headers.get("accept"),
			authorization: headers.get("authorization"),
		});
		return new Response(body, {
			status: init.status ?? 200,
			headers: {
				"content-type":
					init.contentType ?? "application/vnd.github.v3.diff; charset=utf-8",
			},
		});
	};

	return { fetch: fakeFetch, requests };
}
