export { type SimulatedLocalizationConfig, createSimulatedLocalization } from "./localization";
export {
  type SimulatedNavigation,
  type SimulatedNavigationConfig,
  createSimulatedNavigation,
} from "./navigation";
