import { Tool } from "../tool"

export default Tool.define({
  name: "radare2",
  description: "Reverse engineering framework used to disassemble crash sites",
  binary: "radare2",
  probe: { args: ["-v"], marker: "radare2" },
  fallback: "objdump",
  packages: {
    brew: { name: "radare2" },
    port: { name: "radare2", privileged: true },
    apt: { name: "radare2", privileged: true },
    dnf: { name: "radare2", privileged: true },
    yum: { name: "radare2", privileged: true },
    pacman: { name: "radare2", privileged: true },
    zypper: { name: "radare2", privileged: true },
    apk: { name: "radare2", privileged: true },
    choco: { name: "radare2" },
  },
})
