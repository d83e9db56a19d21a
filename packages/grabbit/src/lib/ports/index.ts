export type { HttpClient, HttpHeaders, HttpResponse } from "./http.js";
