export { type Movie } from "./movie.js";
export { type MovieGateway } from "./movie-gateway.js";
