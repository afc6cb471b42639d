/**
 * C# source templates and their registration
 */

import { TemplateFactory, expectModel, type Template } from '../template-factory.js';
import { TemplateBuilder, escapeStringLiteral } from '../template-builder.js';
import {
  isClassTemplateModel,
  isEnumTemplateModel,
  isFileTemplateModel,
  isInheritanceConverterTemplateModel,
  type ClassTemplateModel,
  type EnumTemplateModel,
  type FileTemplateModel,
  type PropertyModel,
} from './models.js';

export const CSHARP_PACKAGE = 'CSharp';

/** Marker whose presence in generated classes requires the converter support type */
export const INHERITANCE_CONVERTER_NAME = 'JsonInheritanceConverter';

function requiredMode(property: PropertyModel): string {
  if (!property.isRequired) {
    return 'Default';
  }
  return property.isNullable ? 'AllowNull' : 'Always';
}

export class ClassTemplate implements Template {
  constructor(private readonly model: ClassTemplateModel) {}

  render(): string {
    const { model } = this;
    const builder = new TemplateBuilder({ includeDocumentation: model.generateDocumentation });
    const indent = builder.getIndent(1);
    const lines = builder.summary(model.description, 0);

    if (model.discriminator !== undefined) {
      lines.push(
        `[Newtonsoft.Json.JsonConverter(typeof(${INHERITANCE_CONVERTER_NAME}), "${escapeStringLiteral(model.discriminator)}")]`
      );
    }

    const inheritance = model.baseClassName ? ` : ${model.baseClassName}` : '';
    lines.push(`public partial class ${model.className}${inheritance}`);
    lines.push('{');

    model.properties.forEach((property, index) => {
      if (index > 0) {
        lines.push('');
      }
      lines.push(...builder.summary(property.description, 1));
      lines.push(
        `${indent}[Newtonsoft.Json.JsonProperty("${escapeStringLiteral(property.name)}", Required = Newtonsoft.Json.Required.${requiredMode(property)})]`
      );
      lines.push(`${indent}public ${property.type} ${property.propertyName} { get; set; }`);
    });

    lines.push('}');
    return lines.join('\n');
  }
}

export class EnumTemplate implements Template {
  constructor(private readonly model: EnumTemplateModel) {}

  render(): string {
    const { model } = this;
    const builder = new TemplateBuilder({ includeDocumentation: model.generateDocumentation });
    const indent = builder.getIndent(1);
    const lines = builder.summary(model.description, 0);

    if (model.isStringEnum) {
      lines.push('[Newtonsoft.Json.JsonConverter(typeof(Newtonsoft.Json.Converters.StringEnumConverter))]');
    }
    lines.push(`public enum ${model.name}`);
    lines.push('{');

    for (const member of model.members) {
      if (member.serializedValue !== undefined) {
        lines.push(`${indent}[System.Runtime.Serialization.EnumMember(Value = "${escapeStringLiteral(member.serializedValue)}")]`);
      }
      lines.push(`${indent}${member.name} = ${member.value},`);
    }

    lines.push('}');
    return lines.join('\n');
  }
}

export class FileTemplate implements Template {
  constructor(private readonly model: FileTemplateModel) {}

  render(): string {
    const builder = new TemplateBuilder();
    const lines = [
      '//----------------------',
      '// <auto-generated>',
      `//     Generated using ${this.model.toolName}`,
      '// </auto-generated>',
      '//----------------------',
      '',
      `namespace ${this.model.namespace}`,
      '{',
      `${builder.getIndent(1)}#pragma warning disable // Disable all warnings`,
    ];

    if (this.model.types.trim()) {
      lines.push('');
      lines.push(builder.indentLines(this.model.types, 1));
    }

    lines.push('}');
    return `${lines.join('\n')}\n`;
  }
}

const INHERITANCE_CONVERTER_SOURCE = `public class JsonInheritanceConverter : Newtonsoft.Json.JsonConverter
{
    internal static readonly string DefaultDiscriminatorName = "discriminator";

    private readonly string _discriminator;

    [System.ThreadStatic]
    private static bool _isReading;

    [System.ThreadStatic]
    private static bool _isWriting;

    public JsonInheritanceConverter()
    {
        _discriminator = DefaultDiscriminatorName;
    }

    public JsonInheritanceConverter(string discriminator)
    {
        _discriminator = discriminator;
    }

    public override void WriteJson(Newtonsoft.Json.JsonWriter writer, object value, Newtonsoft.Json.JsonSerializer serializer)
    {
        try
        {
            _isWriting = true;

            var jObject = Newtonsoft.Json.Linq.JObject.FromObject(value, serializer);
            jObject.AddFirst(new Newtonsoft.Json.Linq.JProperty(_discriminator, value.GetType().Name));
            writer.WriteToken(jObject.CreateReader());
        }
        finally
        {
            _isWriting = false;
        }
    }

    public override bool CanWrite
    {
        get
        {
            if (_isWriting)
            {
                _isWriting = false;
                return false;
            }
            return true;
        }
    }

    public override bool CanRead
    {
        get
        {
            if (_isReading)
            {
                _isReading = false;
                return false;
            }
            return true;
        }
    }

    public override bool CanConvert(System.Type objectType)
    {
        return true;
    }

    public override object ReadJson(Newtonsoft.Json.JsonReader reader, System.Type objectType, object existingValue, Newtonsoft.Json.JsonSerializer serializer)
    {
        var jObject = serializer.Deserialize<Newtonsoft.Json.Linq.JObject>(reader);
        if (jObject == null)
            return null;

        var discriminator = Newtonsoft.Json.Linq.Extensions.Value<string>(jObject.GetValue(_discriminator));
        var subtype = GetObjectSubtype(objectType, discriminator);

        try
        {
            _isReading = true;
            return serializer.Deserialize(jObject.CreateReader(), subtype);
        }
        finally
        {
            _isReading = false;
        }
    }

    private System.Type GetObjectSubtype(System.Type objectType, string discriminator)
    {
        foreach (var type in System.Reflection.IntrospectionExtensions.GetTypeInfo(objectType).Assembly.GetTypes())
        {
            if (type.Name == discriminator && objectType.IsAssignableFrom(type))
                return type;
        }

        return objectType;
    }
}`;

export class InheritanceConverterTemplate implements Template {
  render(): string {
    return INHERITANCE_CONVERTER_SOURCE;
  }
}

/**
 * Registers the C# templates on a factory (a new one when none is given)
 */
export function createCSharpTemplateFactory(factory: TemplateFactory = new TemplateFactory()): TemplateFactory {
  return factory
    .register(CSHARP_PACKAGE, 'Class', model =>
      new ClassTemplate(expectModel(model, isClassTemplateModel, CSHARP_PACKAGE, 'Class')))
    .register(CSHARP_PACKAGE, 'Enum', model =>
      new EnumTemplate(expectModel(model, isEnumTemplateModel, CSHARP_PACKAGE, 'Enum')))
    .register(CSHARP_PACKAGE, 'File', model =>
      new FileTemplate(expectModel(model, isFileTemplateModel, CSHARP_PACKAGE, 'File')))
    .register(CSHARP_PACKAGE, INHERITANCE_CONVERTER_NAME, model => {
      expectModel(model, isInheritanceConverterTemplateModel, CSHARP_PACKAGE, INHERITANCE_CONVERTER_NAME);
      return new InheritanceConverterTemplate();
    });
}
