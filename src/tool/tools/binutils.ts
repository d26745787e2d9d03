import { Tool } from "../tool"

export default Tool.define({
  name: "binutils",
  description: "objdump and friends, the fallback disassembler",
  binary: "objdump",
  probe: { args: ["--version"], marker: "objdump" },
  packages: {
    apt: { name: "binutils", privileged: true },
    dnf: { name: "binutils", privileged: true },
    yum: { name: "binutils", privileged: true },
    pacman: { name: "binutils", privileged: true },
    zypper: { name: "binutils", privileged: true },
    apk: { name: "binutils", privileged: true },
  },
})
