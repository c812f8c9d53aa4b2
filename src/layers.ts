import { Layer } from "effect";
import { GdalRasterConverterLayer } from "./raster/converter.js";
import { ToolRunnerLive } from "./tool-runner/index.js";

export const serviceLayers = ToolRunnerLive;

export const createRasterConverterLayer = (config: {
    readonly converterBin: string;
}) => GdalRasterConverterLayer(config.converterBin).pipe(
    Layer.provideMerge(serviceLayers),
);
