import axios, { type AxiosInstance } from "axios";

export function createHttpClient(): AxiosInstance {
	return axios.create({
		headers: {
			Accept: "application/json",
			"User-Agent": "Mozilla/5.0 (compatible; breakout-scanner/0.1)",
		},
	});
}
