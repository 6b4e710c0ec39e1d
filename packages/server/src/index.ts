export { createPlantGateApp, type AppOverrides, type PlantGateApp } from './app';
