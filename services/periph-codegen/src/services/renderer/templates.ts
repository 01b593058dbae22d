/**
 * Header, layout test and compile-check templates. Compiled when the module
 * loads, so a malformed template fails at startup rather than mid-run.
 */

import { InternalError } from '../../utils/errors';
import { compileTemplate, CompiledTemplate } from './template';

const SOURCES = {
  banner: `// Generated by periph-codegen from {{source}}. Do not edit.
// peripheral: {{peripheral}}
// descriptor: {{descriptor_id}}
// input-hash: {{input_hash}}
#pragma once

#include <cstddef>
#include <cstdint>

namespace {{namespace}} {
`,
  layoutOpen: `
struct {{name|pascal}}RegisterLayout {
`,
  registerOpen: `    struct {{register}} {
        static constexpr std::size_t offset = {{offset|hex}};
`,
  field: `        struct {{field}} {
            static constexpr std::uint32_t position = {{position}};
            static constexpr std::uint32_t width = {{width}};
            static constexpr {{mask_type}} mask = {{mask}};
        };
`,
  registerClose: `    };
`,
  layoutClose: `};
`,
  doc: `/// {{text}}
`,
  templateParam: `{{type|cpp_type}} {{name}}`,
  policyOpen: `template <{{params}}>
struct {{name|pascal}}HardwarePolicy {
    using Layout = {{name|pascal}}RegisterLayout;
`,
  constant: `    static constexpr {{type|cpp_type}} {{name}} = {{value}};
`,
  methodDoc: `
    /// {{text}}
`,
  methodOpen: `    static inline {{return_type|cpp_type}} {{name}}({{parameters}}) noexcept {
`,
  hook: `#ifdef {{hook}}
        {{hook}}({{args}});
#endif
`,
  methodClose: `    }
`,
  parameter: `{{type|cpp_type}} {{name}}`,
  parameterDefault: `{{type|cpp_type}} {{name}} = {{value}}`,
  write: `        reg<{{reg_type}}>(Layout::{{register}}::offset) = {{value}};
`,
  set: `        reg<{{reg_type}}>(Layout::{{register}}::offset) |= {{value}};
`,
  clear: `        reg<{{reg_type}}>(Layout::{{register}}::offset) &= static_cast<{{reg_type}}>(~({{value}}));
`,
  fieldWrite: `        reg<{{reg_type}}>(Layout::{{register}}::offset) = static_cast<{{reg_type}}>(
            (reg<{{reg_type}}>(Layout::{{register}}::offset) & ~Layout::{{register}}::{{field}}::mask) |
            ((static_cast<std::uint32_t>({{value}}) << Layout::{{register}}::{{field}}::position) & Layout::{{register}}::{{field}}::mask));
`,
  read: `        return static_cast<{{return_type|cpp_type}}>(reg<{{reg_type}}>(Layout::{{register}}::offset));
`,
  fieldRead: `        return static_cast<{{return_type|cpp_type}}>(
            (reg<{{reg_type}}>(Layout::{{register}}::offset) & Layout::{{register}}::{{field}}::mask) >> Layout::{{register}}::{{field}}::position);
`,
  wait: `        while ((reg<{{reg_type}}>(Layout::{{register}}::offset) & Layout::{{register}}::{{field}}::mask) {{comparison}} 0u) {
        }
`,
  accessor: `
    template <typename T>
    static inline volatile T& reg(std::size_t offset) noexcept {
#ifdef {{mock_hook}}
        return *reinterpret_cast<volatile T*>({{mock_hook}}() + offset);
#else
        return *reinterpret_cast<volatile T*>({{base_param}} + offset);
#endif
    }
};
`,
  instance: `
constexpr std::uintptr_t {{name|upper_snake}}_BASE = {{base|hex}}u;
using {{name|pascal}}Hardware = {{policy|pascal}}HardwarePolicy<{{args}}>;
`,
  namespaceClose: `
}  // namespace {{namespace}}
`,
  testHeader: `// Layout assertions for {{source}}. Generated by periph-codegen. Do not edit.
#include "{{include}}"

`,
  staticAssert: `static_assert({{expression}} == {{expected}}u, "{{label}}");
`,
  testFooter: `
int main() { return 0; }
`,
  unitHeader: `#include "{{include}}"

void periph_codegen_compile_check() {
`,
  unitCall: `    {{namespace}}::{{alias}}::{{method}}({{args}});
`,
  unitFooter: `}
`,
} as const;

export type TemplateName = keyof typeof SOURCES;

const COMPILED = new Map<string, CompiledTemplate>(
  Object.entries(SOURCES).map(([name, source]): [string, CompiledTemplate] => [name, compileTemplate(name, source)])
);

export function getTemplate(name: TemplateName): CompiledTemplate {
  const template = COMPILED.get(name);
  if (!template) {
    throw new InternalError(`Unknown template ${name}`, { operation: 'getTemplate' });
  }
  return template;
}

export function templateNames(): string[] {
  return [...COMPILED.keys()];
}
