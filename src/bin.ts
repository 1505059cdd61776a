import { main } from "./main";

main().catch((err: unknown) => {
	console.error(err);
	process.exitCode = 1;
});
