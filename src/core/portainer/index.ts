export { CONFIG_EXPORT_FILE, type ConfigExporter, PortainerExporter } from "./config-export";
