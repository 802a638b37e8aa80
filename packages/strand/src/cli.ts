import { consola } from "consola"
import { createProgram } from "@/src/program"

async function main(): Promise<void> {
	await createProgram().parseAsync(process.argv)
}

main().catch((error) => {
	consola.error(error instanceof Error ? error.message : error)
	process.exit(1)
})
