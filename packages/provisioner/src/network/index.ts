export { UdpPortProbe } from "./udp-port-probe.js";
