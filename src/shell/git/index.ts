export { createGitClient, type GitClient } from "./client.js";
