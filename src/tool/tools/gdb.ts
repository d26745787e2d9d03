import { Tool } from "../tool"

export default Tool.define({
  name: "gdb",
  description: "GNU debugger, for symbolizing and inspecting core dumps",
  binary: "gdb",
  probe: { args: ["--version"], marker: "GNU gdb" },
  fallback: "lldb",
  packages: {
    brew: { name: "gdb" },
    apt: { name: "gdb", privileged: true },
    dnf: { name: "gdb", privileged: true },
    yum: { name: "gdb", privileged: true },
    pacman: { name: "gdb", privileged: true },
    zypper: { name: "gdb", privileged: true },
    apk: { name: "gdb", privileged: true },
  },
})
