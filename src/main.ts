import "dotenv/config";
import { createAuthCore } from "./bootstrap.js";
import { Logger } from "./utils/Logger/Logger.js";

async function main(): Promise<void> {
	const { kernel } = createAuthCore();
	await kernel.start();

	// --- Manejador de señales para cierre ordenado ---
	let isShuttingDown = false;

	const shutdownHandler = async (signal: string): Promise<void> => {
		if (isShuttingDown) {
			Logger.warn(`Cierre en progreso (${signal}).`);
			return;
		}
		isShuttingDown = true;

		Logger.info(`Señal ${signal} recibida. Iniciando cierre ordenado...`);

		// Timeout de 15 segundos para el cierre
		const shutdownTimeout = setTimeout(() => {
			Logger.error("Timeout en el cierre. Forzando salida.");
			process.exit(1);
		}, 15000);

		try {
			await kernel.stop();
			clearTimeout(shutdownTimeout);
			Logger.ok("Cierre completado exitosamente.");
			process.exit(0);
		} catch (error) {
			Logger.error(`Error durante el cierre: ${error instanceof Error ? error.message : String(error)}`);
			clearTimeout(shutdownTimeout);
			process.exit(1);
		}
	};

	const onSignal = (signal: string) => () => {
		shutdownHandler(signal).catch((error: unknown) => {
			Logger.error(`Error en el manejador de ${signal}: ${String(error)}`);
			process.exit(1);
		});
	};

	process.on("SIGINT", onSignal("SIGINT")); // Ctrl+C
	process.on("SIGTERM", onSignal("SIGTERM")); // kill

	process.on("unhandledRejection", (reason: unknown) => {
		Logger.error(`Promesa rechazada no manejada: ${reason instanceof Error ? reason.message : String(reason)}`);
		if (!isShuttingDown) onSignal("UNHANDLED_REJECTION")();
	});

	Logger.ok("---------------------------------------");
	Logger.ok("Núcleo de autenticación en funcionamiento.");
	Logger.info("Presiona Ctrl+C para salir.");
	Logger.ok("---------------------------------------");
}

try {
	await main();
} catch (err) {
	Logger.error(`Error iniciando: ${err instanceof Error ? err.message : String(err)}`);
	process.exitCode = 1;
}
