import { getPrinter, type Printer, type PrinterRegistry } from "./printer";
import { jsonPrinter } from "./json";
import { textPrinter } from "./text";

export const printers: PrinterRegistry = {
    [textPrinter.id]: textPrinter,
    [jsonPrinter.id]: jsonPrinter,
};

export function resolvePrinter(id: string): Printer {
    return getPrinter(printers, id);
}
