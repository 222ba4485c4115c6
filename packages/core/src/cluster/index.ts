/**
 * Cluster Module - Host naming for a cluster of numbered hosts
 */

export { ClusterTopology, renderHostTemplate } from "./topology.js";
